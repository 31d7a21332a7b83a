/**
 * IFileStorage Interface
 *
 * Port for the temporary storage of files uploaded on one step and needed
 * again on later requests (revalidation at the end of the wizard).
 *
 * @module packages/core/ports/file-storage
 */

import type { UploadedFile } from './form.js';

/**
 * Port interface for temporary file storage.
 */
export interface IFileStorage {
  /**
   * Store a file.
   *
   * @param file - Uploaded file
   * @returns Name under which the file can be opened again
   */
  save(file: UploadedFile): string;

  /**
   * Open a stored file.
   *
   * @param name - Name returned by `save`
   * @returns The file, or null if it no longer exists
   */
  open(name: string): UploadedFile | null;

  /**
   * Delete a stored file. Deleting a missing file is a no-op.
   *
   * @param name - Name returned by `save`
   */
  delete(name: string): void;
}
