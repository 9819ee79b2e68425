/**
 * Error Classifier
 *
 * Turns a failed Bedrock call into a readable message. Classification only
 * affects presentation; retries are left to the SDK's own retry strategy.
 */

import { BedrockRuntimeServiceException } from '@aws-sdk/client-bedrock-runtime';

export type BedrockErrorCategory =
  | 'modelTimeout'
  | 'accessDenied'
  | 'resourceNotFound'
  | 'throttling'
  | 'serviceUnavailable'
  | 'internalServer'
  | 'validation'
  | 'modelNotReady'
  | 'modelError'
  | 'serviceQuotaExceeded'
  | 'unknown';

export interface ClassifiedError {
  category: BedrockErrorCategory;
  /** Service exception name, e.g. ThrottlingException. Absent for non-service errors. */
  code?: string;
  message: string;
}

const CATEGORIES: Record<string, BedrockErrorCategory> = {
  ModelTimeoutException: 'modelTimeout',
  AccessDeniedException: 'accessDenied',
  ResourceNotFoundException: 'resourceNotFound',
  ThrottlingException: 'throttling',
  ServiceUnavailableException: 'serviceUnavailable',
  InternalServerException: 'internalServer',
  ValidationException: 'validation',
  ModelNotReadyException: 'modelNotReady',
  ModelErrorException: 'modelError',
  ServiceQuotaExceededException: 'serviceQuotaExceeded',
};

export const FALLBACK_MESSAGES: Record<BedrockErrorCategory, string> = {
  modelTimeout:
    'The request took too long to process. Processing time exceeded the model timeout length.',
  accessDenied:
    'The request is denied because you do not have sufficient permissions to perform the requested action.',
  resourceNotFound: 'The specified resource ARN was not found.',
  throttling: 'Your request was denied due to exceeding the account quotas for AWS Bedrock.',
  serviceUnavailable: "The service isn't currently available.",
  internalServer: 'An internal server error occurred.',
  validation: 'The input fails to satisfy the constraints specified by AWS Bedrock.',
  modelNotReady:
    'The model specified in the request is not ready to serve inference requests. The AWS SDK will automatically retry the operation up to 5 times.',
  modelError: 'The request failed due to an error while processing the model.',
  serviceQuotaExceeded: 'Your request exceeds the service quota for your account.',
  unknown:
    'An unexpected error occurred (e.g., invalid JSON returned by the service or an unknown error code).',
};

export function classifyBedrockError(error: unknown): ClassifiedError {
  if (!(error instanceof BedrockRuntimeServiceException)) {
    // Transport failures keep their own message
    const message = error instanceof Error && error.message !== '' ? error.message : String(error);
    return { category: 'unknown', message };
  }

  const category = CATEGORIES[error.name] ?? 'unknown';
  if (category === 'unknown') {
    return { category, code: error.name, message: FALLBACK_MESSAGES.unknown };
  }

  const message = error.message.trim() === '' ? FALLBACK_MESSAGES[category] : error.message;
  return { category, code: error.name, message };
}
