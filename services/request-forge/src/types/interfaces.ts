export interface RandomSource {
  /** Must return exactly `size` bytes. */
  randomBytes(size: number): Buffer;
}

export interface MimeTypeResolver {
  /**
   * Content type announced for an uploaded file, usually derived from the
   * filename extension.
   */
  typeFor(filename: string): string;
}
