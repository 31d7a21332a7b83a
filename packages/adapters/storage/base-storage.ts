/**
 * BaseWizardStorage
 *
 * In-memory record of one wizard traversal implementing IWizardStorage.
 * Backends extend it with `load` / `commit` against their persistence layer
 * (server-side session store, signed cookie).
 *
 * Uploaded files are written to file storage when a step is stored and
 * referenced by name in the record; `reset` deletes them.
 */

import type { Logger } from 'pino';
import {
  createEmptyState,
  NoFileStorageConfiguredError,
  type StoredFileRef,
  type WizardStateData,
} from '@stepwise/core/domain';
import type {
  FormData,
  FormFiles,
  IFileStorage,
  IPersistentWizardStorage,
} from '@stepwise/core/ports';

/**
 * Options shared by all storage backends.
 */
export interface WizardStorageOptions {
  /** Wizard prefix (normalized wizard name) */
  prefix: string;
  /** Logger instance */
  logger: Logger;
  /** File storage for uploaded files */
  fileStorage?: IFileStorage | null;
}

export abstract class BaseWizardStorage implements IPersistentWizardStorage {
  readonly prefix: string;
  protected readonly fileStorage: IFileStorage | null;
  protected readonly log: Logger;
  protected state: WizardStateData = createEmptyState();

  constructor(options: WizardStorageOptions, component: string) {
    this.prefix = options.prefix;
    this.fileStorage = options.fileStorage ?? null;
    this.log = options.logger.child({ component, prefix: options.prefix });
  }

  abstract commit(): Promise<void>;

  // ===========================================================================
  // Current Step
  // ===========================================================================

  getCurrentStep(): string | null {
    return this.state.step;
  }

  setCurrentStep(step: string | null): void {
    this.state.step = step;
  }

  // ===========================================================================
  // Step Data
  // ===========================================================================

  getStepData(step: string): FormData | null {
    return this.state.stepData[step] ?? null;
  }

  setStepData(step: string, data: FormData | null): void {
    if (data === null) {
      delete this.state.stepData[step];
      return;
    }
    this.state.stepData[step] = { ...data };
  }

  getCurrentStepData(): FormData | null {
    const step = this.state.step;
    return step === null ? null : this.getStepData(step);
  }

  // ===========================================================================
  // Step Files
  // ===========================================================================

  getStepFiles(step: string): FormFiles | null {
    const refs = this.state.stepFiles[step];
    if (!refs) {
      return null;
    }
    const entries = Object.entries(refs);
    if (entries.length > 0 && !this.fileStorage) {
      throw new NoFileStorageConfiguredError();
    }

    const files: FormFiles = {};
    for (const [field, ref] of entries) {
      const file = this.fileStorage?.open(ref.tmpName);
      if (!file) {
        this.log.warn({ step, field, tmpName: ref.tmpName }, 'Stored wizard file is missing');
        continue;
      }
      files[field] = { ...file, name: ref.name, contentType: ref.contentType };
    }
    return files;
  }

  setStepFiles(step: string, files: FormFiles | null): void {
    const entries = Object.entries(files ?? {});
    if (entries.length > 0 && !this.fileStorage) {
      throw new NoFileStorageConfiguredError();
    }

    const refs: Record<string, StoredFileRef> = {};
    for (const [field, file] of entries) {
      const tmpName = this.fileStorage?.save(file);
      if (tmpName === undefined) {
        continue;
      }
      refs[field] = {
        tmpName,
        name: file.name,
        contentType: file.contentType,
        size: file.size,
      };
    }
    this.deleteStoredFiles(this.state.stepFiles[step]);
    this.state.stepFiles[step] = refs;
  }

  getCurrentStepFiles(): FormFiles | null {
    const step = this.state.step;
    return step === null ? null : this.getStepFiles(step);
  }

  // ===========================================================================
  // Extra Data
  // ===========================================================================

  get extraData(): Record<string, unknown> {
    return this.state.extraData;
  }

  set extraData(extraData: Record<string, unknown>) {
    this.state.extraData = extraData;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  reset(): void {
    for (const refs of Object.values(this.state.stepFiles)) {
      this.deleteStoredFiles(refs);
    }
    this.state = createEmptyState();
    this.log.debug('Wizard state reset');
  }

  /**
   * Copy of the current record, safe to serialize.
   */
  snapshot(): WizardStateData {
    return structuredClone(this.state);
  }

  protected serialize(): string {
    return JSON.stringify(this.state);
  }

  private deleteStoredFiles(refs: Record<string, StoredFileRef> | undefined): void {
    if (!refs || !this.fileStorage) {
      return;
    }
    for (const ref of Object.values(refs)) {
      this.fileStorage.delete(ref.tmpName);
    }
  }
}
