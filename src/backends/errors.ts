import { AbstractError } from '@matrixai/errors';

class ErrorBackend<T> extends AbstractError<T> {
  static description = 'Backend error';
}

class ErrorBackendRunning<T> extends ErrorBackend<T> {
  static description = 'Backend is running';
}

class ErrorBackendNotRunning<T> extends ErrorBackend<T> {
  static description = 'Backend is not running';
}

class ErrorBackendDestroyed<T> extends ErrorBackend<T> {
  static description = 'Backend is destroyed';
}

class ErrorBackendNotFound<T> extends ErrorBackend<T> {
  static description = 'Entry cannot be found';
}

class ErrorBackendInvalidName<T> extends ErrorBackend<T> {
  static description = 'Entry name is not valid for this backend';
}

class ErrorBackendRead<T> extends ErrorBackend<T> {
  static description = 'Failed to read entry';
}

class ErrorBackendWrite<T> extends ErrorBackend<T> {
  static description = 'Failed to write entry';
}

class ErrorBackendDelete<T> extends ErrorBackend<T> {
  static description = 'Failed to delete entry';
}

export {
  ErrorBackend,
  ErrorBackendRunning,
  ErrorBackendNotRunning,
  ErrorBackendDestroyed,
  ErrorBackendNotFound,
  ErrorBackendInvalidName,
  ErrorBackendRead,
  ErrorBackendWrite,
  ErrorBackendDelete,
};
