/**
 * Error formatting utilities for user-friendly error messages
 */

import { isScheduleError, type ScheduleErrorCode } from '../errors.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

const SUGGESTIONS: Record<ScheduleErrorCode, string> = {
  INVALID_INPUT: 'Check the IDs and day of week (0 = Sunday, 6 = Saturday) you passed.',
  INSUFFICIENT_DATA: 'No activity recorded in the last year. Record live samples before predicting.',
  NOT_FOUND: 'Check the ID exists. Custom programmes must be created before they can be edited.',
  STORE_FAILURE: 'Check database file permissions, disk space and DATABASE_PATH.'
};

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  if (isScheduleError(error)) {
    return {
      message: `${describeCode(error.code)} while ${context}: ${shortenMessage(error.message)}`,
      suggestion: SUGGESTIONS[error.code],
      technical: error.cause === undefined ? undefined : extractTechnicalDetails(causeMessage(error.cause))
    };
  }

  const errorStr = error instanceof Error ? error.message : String(error);

  if (errorStr.includes('SQLITE') || errorStr.includes('database')) {
    return {
      message: `Database error while ${context}`,
      suggestion: SUGGESTIONS.STORE_FAILURE,
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details. If persistent, report issue with error details.',
    technical: undefined
  };
}

function describeCode(code: ScheduleErrorCode): string {
  switch (code) {
    case 'INVALID_INPUT':
      return 'Invalid input';
    case 'INSUFFICIENT_DATA':
      return 'Not enough activity history';
    case 'NOT_FOUND':
      return 'Not found';
    case 'STORE_FAILURE':
      return 'Storage error';
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  const cleaned = errorStr.split('\n')[0];
  return cleaned ? shortenMessage(cleaned) : undefined;
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
