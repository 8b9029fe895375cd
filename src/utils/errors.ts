/**
 * Typed failures raised inside I/O layers and converted to result objects
 * before they reach the orchestrator.
 */

export type InventoryErrorCode =
  | 'FILE_NOT_FOUND'
  | 'NOT_CSV'
  | 'DECODE_ERROR'
  | 'READ_ERROR';

export class InventoryReadError extends Error {
  readonly code: InventoryErrorCode;
  readonly filePath: string;

  constructor(code: InventoryErrorCode, filePath: string, reason: string) {
    super(reason);
    this.name = 'InventoryReadError';
    this.code = code;
    this.filePath = filePath;
  }
}

export class CatalogRequestError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'CatalogRequestError';
  }
}
