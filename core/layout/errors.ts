export type WallspanErrorCode =
  | 'EMPTY_LAYOUT'
  | 'UNREADABLE_IMAGE'
  | 'POOL_EXHAUSTED'
  | 'INVALID_RESOLUTION'
  | 'INVALID_OPTION'
  | 'PATH_NOT_FOUND'
  | 'OUTPUT_PATH_INVALID'
  | 'DISPLAY_QUERY_FAILED'
  | 'WALLPAPER_APPLY_FAILED'
  | 'WRITE_FAILED';

export class WallspanError extends Error {
  public readonly code: WallspanErrorCode;
  public readonly details?: Record<string, string | number>;

  constructor(code: WallspanErrorCode, message: string, details?: Record<string, string | number>) {
    super(message);
    this.name = 'WallspanError';
    this.code = code;
    this.details = details;
  }
}

export function isWallspanError(value: unknown): value is WallspanError {
  return value instanceof WallspanError;
}
