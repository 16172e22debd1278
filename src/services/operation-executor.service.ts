import fs from 'fs';
import path from 'path';
import { OperationMode, PendingOperation } from '../types/media.types';
import { IoFailureError } from '../utils/errors';

const MODE_VERBS: Record<OperationMode, string> = {
  [OperationMode.Copy]: 'copy',
  [OperationMode.Move]: 'move',
  [OperationMode.Link]: 'hard-link',
};

export class OperationExecutor {
  /**
   * Apply the plan in order. The first failure stops the batch; operations
   * already applied stay applied.
   *
   * @returns number of operations completed
   */
  execute(mode: OperationMode, operations: PendingOperation[]): number {
    let completed = 0;

    for (const operation of operations) {
      this.executeOne(mode, operation);
      completed++;
    }

    return completed;
  }

  executeOne(mode: OperationMode, { source, destination }: PendingOperation): void {
    const parent = path.dirname(destination);
    try {
      fs.mkdirSync(parent, { recursive: true });
    } catch (error) {
      throw new IoFailureError(parent, 'Failed to create directory', error);
    }

    try {
      switch (mode) {
        case OperationMode.Copy:
          fs.copyFileSync(source, destination);
          break;
        case OperationMode.Move:
          fs.renameSync(source, destination);
          break;
        case OperationMode.Link:
          fs.linkSync(source, destination);
          break;
      }
    } catch (error) {
      throw new IoFailureError(failedPath(error, source), `Failed to ${MODE_VERBS[mode]} ${source} -> ${destination}`, error);
    }
  }
}

function failedPath(error: unknown, fallback: string): string {
  if (error instanceof Error && 'path' in error && typeof error.path === 'string') {
    return error.path;
  }
  return fallback;
}
