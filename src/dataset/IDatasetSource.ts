/**
 * Read-only access to the raw knowledge-base text.
 */

export interface IDatasetSource {
  /** Full location, for logs. */
  readonly description: string;

  /** Short name without the location, for API responses. */
  readonly name: string;

  /** Return the full delimited text. Throws DatasetError('Unreadable') on failure. */
  read(): Promise<string>;
}
