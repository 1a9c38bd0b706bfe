export interface QuarantineRepository {
  /**
   * Keep a payload the server refused for good. Resolves to the file written.
   */
  save(statusCode: number, payload: string): Promise<string>;
}
