/**
 * Where documents come from. Implementations hold no pipeline state.
 */
export interface DocumentSource {
  readonly name: string;
  /** Stable document id for a user-supplied reference, or null if it does not resolve */
  resolveDocumentId(ref: string): string | null;
  /**
   * Document text, or null when the source has nothing for this id.
   * Transport failures reject with SourceUnavailableError.
   */
  fetchDocument(documentId: string): Promise<string | null>;
}
