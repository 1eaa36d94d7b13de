/**
 * Interface for writing ETL assets into object storage buckets.
 */
export interface IObjectStorageService {
  /**
   * Upload a local file.
   * @param bucketName - Bucket name without the gs:// scheme
   * @param localPath - Path of the file on disk
   * @param destination - Object name inside the bucket
   */
  uploadFile(bucketName: string, localPath: string, destination: string): Promise<void>;

  /**
   * Write an object from an in-memory string (used for folder markers).
   */
  writeObject(bucketName: string, objectName: string, contents: string): Promise<void>;

  /**
   * List object names under a prefix.
   */
  listObjects(bucketName: string, prefix: string): Promise<string[]>;
}
