/**
 * No-IP update response protocol
 *
 * The body holds one status line per submitted hostname, in submission order.
 */
import type { Logger } from 'pino';
import type { ServerResponseLine } from '../../types/index.js';

// Back off: retry no sooner than 30 minutes
export const SERVER_ERRORS: Readonly<Record<string, string>> = {
  '911':
    'A fatal error on the provider side such as a database outage. Retry the update no sooner than 30 minutes. ' +
    'A 500 HTTP error may also be returned for the same reason, with the same retry guidance.',
};

// Retrying will not help: these need operator action
export const USER_ERRORS: Readonly<Record<string, string>> = {
  nohost:
    'Hostname supplied does not exist under the specified account. New login credentials are required before performing an additional request.',
  badauth: 'Invalid username password combination.',
  badagent:
    'Client disabled. No more updates should be sent without user intervention. ' +
    'Requests must use the recommended User-Agent format, otherwise the client may be blocked.',
  '!donator':
    'An update request was sent including a feature that is not available to that particular user, such as offline options.',
  abuse:
    'Username is blocked due to abuse, either for not following the update specifications or for violating the terms of service. Updates should stop.',
};

const LINE_SEPARATOR = /[\r\n]+/;

/**
 * Classify a single trimmed response line
 */
export function parseResponseLine(line: string, logger?: Logger): ServerResponseLine {
  if (line.startsWith('good ')) {
    return { status: 'update', raw: line, address: line.slice('good '.length).trim() };
  }

  if (line.startsWith('nochg ')) {
    return { status: 'no-change', raw: line, address: line.slice('nochg '.length).trim() };
  }

  const serverError = lookup(SERVER_ERRORS, line);
  if (serverError !== undefined) {
    logger?.warn({ code: line }, `Server responded with server error: ${serverError}`);
    return { status: 'server-error', raw: line };
  }

  const userError = lookup(USER_ERRORS, line);
  if (userError !== undefined) {
    logger?.error({ code: line }, `Server responded with user error: ${userError}`);
    return { status: 'user-error', raw: line };
  }

  logger?.warn({ response: line }, 'Unsupported response line');
  return { status: 'unsupported', raw: line };
}

/**
 * Split a response body into lines and classify each one.
 * Blank lines are dropped; the result is aligned with the non-blank lines.
 */
export function parseResponse(body: string, logger?: Logger): ServerResponseLine[] {
  return body
    .split(LINE_SEPARATOR)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => parseResponseLine(line, logger));
}

function lookup(table: Readonly<Record<string, string>>, code: string): string | undefined {
  return Object.hasOwn(table, code) ? table[code] : undefined;
}
