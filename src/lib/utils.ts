import axios from 'axios';

/**
 * Result of a call to an external service.
 * Callers branch on `success`.
 */
export type Outcome<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function succeed<T>(data: T): Outcome<T> {
  return { success: true, data };
}

export function fail<T = never>(error: string): Outcome<T> {
  return { success: false, error };
}

/**
 * Produces a short, loggable description of a thrown value.
 * axios errors carrying a response are reported by HTTP status.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Collapses runs of whitespace (including newlines and blank lines) into
 * single spaces and trims the result.
 */
export function cleanContent(text: string | undefined): string {
  if (!text) return '';
  return text
    .replace(/[\n\t\r]+/g, ' ') // Replace newlines/tabs/CR with spaces
    .replace(/\s\s+/g, ' ')
    .trim();
}
