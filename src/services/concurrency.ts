import {
  ConflictError,
  NotFoundError,
  UniqueConstraintError,
} from "@/utils/errors";

/**
 * Runs a versioned write. When the store reports a conflict the record is
 * looked up once: a vanished record becomes NotFound, otherwise the conflict
 * is rethrown. Nothing is retried.
 */
export const withConflictRecheck = async <R>(
  label: string,
  stillExists: () => Promise<boolean>,
  write: () => Promise<R>
): Promise<R> => {
  try {
    return await write();
  } catch (error) {
    if (error instanceof ConflictError && !(error instanceof UniqueConstraintError)) {
      if (!(await stillExists())) {
        throw new NotFoundError(`${label} no longer exists`);
      }
    }
    throw error;
  }
};
