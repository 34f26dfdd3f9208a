/**
 * Raw access to the BOL02 export. Implementations return the CSV text as-is
 * and throw when the location cannot be read.
 */
export interface ITrackingSource {
  readonly location: string;
  fetchRaw(): Promise<string>;
}
