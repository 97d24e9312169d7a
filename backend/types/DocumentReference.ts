/**
 * An uploaded object to process, taken from the triggering S3 event
 */
export interface DocumentReference {
  readonly bucket: string;
  readonly key: string;
}
