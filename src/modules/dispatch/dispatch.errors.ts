/**
 * Error -> `error` envelope for the originating connection.
 */

import { config } from '../../config/environment';
import { AppError, ErrorCode, MessageType } from '../../core';
import { ErrorPayload, OutboundMessage } from './dispatch.types';

export function toErrorMessage(error: unknown, requestType?: string): OutboundMessage<ErrorPayload> {
  if (error instanceof AppError) {
    return {
      type: MessageType.ERROR,
      data: {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {}),
        retryable: error.retryable,
        ...(requestType !== undefined ? { requestType } : {})
      }
    };
  }

  // Internal error details never leave the process in production
  const message = !config.isProduction && error instanceof Error
    ? error.message
    : 'An unexpected error occurred';

  return {
    type: MessageType.ERROR,
    data: {
      code: ErrorCode.INTERNAL_ERROR,
      message,
      retryable: false,
      ...(requestType !== undefined ? { requestType } : {})
    }
  };
}
