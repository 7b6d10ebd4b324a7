import { AbstractError } from '@matrixai/errors';

class ErrorUnitOfWork<T> extends AbstractError<T> {
  static description = 'Unit of work error';
}

class ErrorUnitOfWorkAlreadyExists<T> extends ErrorUnitOfWork<T> {
  static description = 'File already exists in the backend';
}

class ErrorUnitOfWorkNotFound<T> extends ErrorUnitOfWork<T> {
  static description = 'File does not exist in the backend';
}

/**
 * Backend operation failed while staging or committing
 * The `cause` is the error raised by the backend
 */
class ErrorUnitOfWorkBackend<T> extends ErrorUnitOfWork<T> {
  static description = 'Backend operation failed';
}

/**
 * Compensating operation failed during rollback
 * The backend may be left inconsistent and require manual repair
 */
class ErrorUnitOfWorkCompensation<T> extends ErrorUnitOfWork<T> {
  static description = 'Compensating operation failed during rollback';
}

export {
  ErrorUnitOfWork,
  ErrorUnitOfWorkAlreadyExists,
  ErrorUnitOfWorkNotFound,
  ErrorUnitOfWorkBackend,
  ErrorUnitOfWorkCompensation,
};
