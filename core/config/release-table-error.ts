/** Error for release tables that cannot be used. */
export class ReleaseTableError extends Error {
  /**
   * Creates a new ReleaseTableError.
   *
   * @param message - What is wrong with the table.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ReleaseTableError'
  }
}
