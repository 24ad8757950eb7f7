/** Error for input metadata files that cannot be used. */
export class InputMetadataError extends Error {
  /**
   * Creates a new InputMetadataError.
   *
   * @param message - What is wrong with the metadata.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'InputMetadataError'
  }
}
