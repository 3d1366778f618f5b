export interface PublicUrlResolver {
  getPublicUrl(path: string): string;
}

/** Turns a stored PDF reference into a URL a client can open. */
export class ResumeFileService {
  constructor(private readonly storage?: PublicUrlResolver) {}

  resolveUrl(reference: string | null | undefined): string | null {
    const trimmed = reference?.trim();
    if (!trimmed) {
      return null;
    }
    if (/^https?:\/\//i.test(trimmed)) {
      return trimmed;
    }
    return this.storage ? this.storage.getPublicUrl(trimmed) : null;
  }
}
