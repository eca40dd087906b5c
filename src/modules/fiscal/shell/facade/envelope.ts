/**
 * Response envelopes shared by every facade operation.
 */

import { getHttpStatusForError, type FiscalError } from '../../core/errors.js';

export type SuccessEnvelope<T extends object> = { status: 'success' } & T;

export interface NotFoundEnvelope {
  status: 'not_found';
  message: string;
}

export interface ErrorEnvelope {
  status: 'error';
  error_message: string;
}

export type Envelope<T extends object> = SuccessEnvelope<T> | NotFoundEnvelope | ErrorEnvelope;

export interface FacadeResponse<T extends object> {
  httpStatus: number;
  body: Envelope<T>;
}

/** Shown to callers in place of backend details, which only go to the log */
export const BACKEND_FAILURE_MESSAGE = 'An error occurred while querying fiscal data';

export const success = <T extends object>(payload: T): FacadeResponse<T> => ({
  httpStatus: 200,
  body: { status: 'success', ...payload },
});

/**
 * Empty result sets that are not errors (e.g. a search with no matches).
 */
export const notFound = <T extends object>(message: string): FacadeResponse<T> => ({
  httpStatus: 200,
  body: { status: 'not_found', message },
});

export const failure = <T extends object>(error: FiscalError): FacadeResponse<T> => {
  const httpStatus = getHttpStatusForError(error);
  const message = httpStatus >= 500 ? BACKEND_FAILURE_MESSAGE : error.message;
  return { httpStatus, body: { status: 'error', error_message: message } };
};
