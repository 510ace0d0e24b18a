import axios from 'axios';

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Body as text, whatever axios managed to parse it into. */
export function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  return JSON.stringify(data);
}

function messageField(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('message' in value)) return undefined;
  return typeof value.message === 'string' ? value.message : undefined;
}

/**
 * Error text for a failed response: the JSON body's `message` field when
 * there is one, else the raw body, else a generic status line.
 */
export function extractErrorMessage(data: unknown, status: number): string {
  let parsed: unknown = data;
  if (typeof data === 'string') {
    try {
      parsed = JSON.parse(data);
    } catch {
      parsed = undefined;
    }
  }

  const text = messageField(parsed) ?? bodyText(data);
  return text !== '' ? text : `Request failed with status ${status}`;
}

export function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
