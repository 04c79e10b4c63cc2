export type DocumentErrorKind = "not_found" | "unparseable";

export type DocumentTier = "bootstrap" | "instance" | "user";

/**
 * Why a document could not be used. `not_found` and `unparseable` are handled
 * identically by the resolver; the distinction exists for diagnostics.
 */
export class IdentityDocumentError extends Error {
  readonly kind: DocumentErrorKind;
  readonly path: string;

  constructor(kind: DocumentErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IdentityDocumentError";
    this.kind = kind;
    this.path = path;
  }
}

export type DocumentFailure = {
  tier: DocumentTier;
  kind: DocumentErrorKind;
  path: string;
  message: string;
};

export function toDocumentFailure(tier: DocumentTier, error: IdentityDocumentError): DocumentFailure {
  return { tier, kind: error.kind, path: error.path, message: error.message };
}
