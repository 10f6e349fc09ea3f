export type PriceSourceErrorCategory =
  | "transport"
  | "timeout"
  | "http_status"
  | "invalid_body"
  | "empty_response";

export class PriceSourceError extends Error {
  readonly category: PriceSourceErrorCategory;
  readonly status?: number;

  constructor(category: PriceSourceErrorCategory, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PriceSourceError";
    this.category = category;
    if (options?.status !== undefined) this.status = options.status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCategory(error: unknown): PriceSourceErrorCategory | "unknown" {
  return error instanceof PriceSourceError ? error.category : "unknown";
}
