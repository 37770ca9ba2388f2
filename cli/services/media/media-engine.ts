/**
 * Media resolution engine
 *
 * Runs one query through scan → dedupe → term filter → metadata resolution,
 * then post-validates the candidates so broken references never reach the
 * caller. Scan and item failures shrink the result; they are never thrown.
 */

import * as path from 'path';
import {
  CandidateRecord,
  DirectoryConfig,
  MediaBirthprint,
  MediaQuery,
  ScanScope,
  ValidationBatchResult,
  ValidationResult,
} from '../../lib/media-types';
import { logger } from '../../utils/logger';
import { AssetScanner } from './asset-scanner';
import { birthprintOf, uriToPath } from './birthprint';
import { deduplicateAssets } from './deduplication';
import { classify } from './format-classifier';
import { MetadataResolver } from './metadata-resolver';
import { filterByTerms } from './term-filter';
import { UriValidator, ValidationRequest } from './uri-validator';

export interface MediaEngineDeps {
  scanner: AssetScanner;
  resolver: MetadataResolver;
  validator: UriValidator;
  directories?: DirectoryConfig;
  postValidate?: boolean;
}

export class MediaResolutionEngine {
  private scanner: AssetScanner;
  private resolver: MetadataResolver;
  private validator: UriValidator;
  private directories: DirectoryConfig;
  private postValidate: boolean;

  constructor(deps: MediaEngineDeps) {
    this.scanner = deps.scanner;
    this.resolver = deps.resolver;
    this.validator = deps.validator;
    this.directories = deps.directories ?? { enabled: false, paths: new Set() };
    this.postValidate = deps.postValidate ?? true;
  }

  /**
   * Resolve a query into candidate records, newest first
   */
  async findCandidates(query: MediaQuery): Promise<CandidateRecord[]> {
    const scope = this.resolveScope(query);
    logger.info(
      `Searching media: terms=[${query.terms.join(', ')}] kind=${query.mediaKind ?? 'all'} scope=${describeScope(scope)}`
    );

    const scanned = await this.scanner.scan(scope, {
      kind: query.mediaKind,
      dateRange: query.dateRange,
    });
    const unique = deduplicateAssets(scanned);
    const matching = filterByTerms(unique, query.terms, query.originalQuery);
    const records = await this.resolver.resolve(matching);

    if (!this.postValidate || records.length === 0) {
      return records;
    }
    return this.validateCandidates(records);
  }

  async validate(uri: string, reference?: MediaBirthprint, assetId?: string): Promise<ValidationResult> {
    return this.validator.validate(uri, reference, assetId);
  }

  async validateAll(requests: readonly ValidationRequest[]): Promise<ValidationBatchResult> {
    return this.validator.validateAll(requests);
  }

  /**
   * Query directory first, then enabled custom directories, then default albums
   */
  resolveScope(query: MediaQuery): ScanScope {
    if (query.directoryScope) {
      return { type: 'directories', paths: [query.directoryScope] };
    }
    if (this.directories.enabled && this.directories.paths.size > 0) {
      return { type: 'directories', paths: Array.from(this.directories.paths) };
    }
    return { type: 'default-albums' };
  }

  /**
   * Drop candidates that fail validation; recovered ones take the new URI
   */
  private async validateCandidates(records: CandidateRecord[]): Promise<CandidateRecord[]> {
    const batch = await this.validator.validateAll(
      records.map((record) => ({ uri: record.fileUri, reference: birthprintOf(record), assetId: record.id }))
    );

    const kept: CandidateRecord[] = [];
    batch.results.forEach((result, index) => {
      const record = records[index];
      if (!result.isValid) {
        logger.debug(`Dropping ${record.id}: ${result.failureReason ?? 'invalid'}`);
        return;
      }
      if (!result.wasRecovered) {
        kept.push(record);
        return;
      }
      const recoveredPath = uriToPath(result.effectiveUri);
      kept.push({
        ...record,
        fileUri: result.effectiveUri,
        mimeType: recoveredPath ? classify(recoveredPath).mimeType : record.mimeType,
      });
    });

    if (batch.failedItems > 0 || batch.recoveredItems > 0) {
      logger.info(
        `Post-validation: ${batch.validItems} valid, ${batch.recoveredItems} recovered, ${batch.failedItems} dropped`
      );
    }
    return kept;
  }
}

function describeScope(scope: ScanScope): string {
  return scope.type === 'default-albums'
    ? 'default albums'
    : scope.paths.map((p) => path.basename(p) || p).join(', ');
}
