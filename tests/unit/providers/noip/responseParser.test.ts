/**
 * No-IP response protocol parser tests
 */
import { describe, it, expect } from 'vitest';
import { parseResponse, parseResponseLine } from '../../../../src/providers/noip/responseParser.js';
import { createCapturingLogger, LEVEL } from '../../../helpers/captureLogger.js';

describe('parseResponse', () => {
  it('should classify each line in order', () => {
    const lines = parseResponse('good 1.2.3.4\nnochg 1.2.3.4\nbadauth\n911\nfoobar');

    expect(lines.map((line) => line.status)).toEqual(['update', 'no-change', 'user-error', 'server-error', 'unsupported']);
  });

  it('should accept \\r, \\n and \\r\\n separators', () => {
    const lines = parseResponse('good 1.2.3.4\r\nnochg 1.2.3.4\rgood 1.2.3.4\n');

    expect(lines.map((line) => line.status)).toEqual(['update', 'no-change', 'update']);
  });

  it('should drop blank and whitespace-only lines and trim the rest', () => {
    const lines = parseResponse('\n   \n  good 5.6.7.8  \n\t\n');

    expect(lines).toEqual([{ status: 'update', raw: 'good 5.6.7.8', address: '5.6.7.8' }]);
  });

  it('should return no lines for an empty body', () => {
    expect(parseResponse('')).toEqual([]);
    expect(parseResponse(' \r\n ')).toEqual([]);
  });

  it('should keep the address echoed by good and nochg lines', () => {
    const [good, nochg] = parseResponse('good 9.9.9.9\nnochg 8.8.8.8');

    expect(good?.address).toBe('9.9.9.9');
    expect(nochg?.address).toBe('8.8.8.8');
  });
});

describe('parseResponseLine', () => {
  it('should recognise every user error code', () => {
    for (const code of ['nohost', 'badauth', 'badagent', '!donator', 'abuse']) {
      expect(parseResponseLine(code).status).toBe('user-error');
    }
  });

  it('should require the space after good and nochg', () => {
    expect(parseResponseLine('good').status).toBe('unsupported');
    expect(parseResponseLine('goodness').status).toBe('unsupported');
    expect(parseResponseLine('nochg').status).toBe('unsupported');
  });

  it('should match error codes exactly', () => {
    expect(parseResponseLine('9111').status).toBe('unsupported');
    expect(parseResponseLine('BADAUTH').status).toBe('unsupported');
    expect(parseResponseLine('badauth please').status).toBe('unsupported');
  });

  it('should not treat inherited object keys as codes', () => {
    expect(parseResponseLine('constructor').status).toBe('unsupported');
    expect(parseResponseLine('toString').status).toBe('unsupported');
  });

  it('should log server errors as warnings with the remediation text', () => {
    const { logger, records } = createCapturingLogger();

    parseResponseLine('911', logger);

    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe(LEVEL.warn);
    expect(records[0]?.code).toBe('911');
    expect(records[0]?.msg).toContain('Retry the update no sooner than 30 minutes');
  });

  it('should log user errors as errors with the explanation', () => {
    const { logger, records } = createCapturingLogger();

    parseResponseLine('badauth', logger);

    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe(LEVEL.error);
    expect(records[0]?.msg).toBe('Server responded with user error: Invalid username password combination.');
  });

  it('should log unsupported lines with the raw text', () => {
    const { logger, records } = createCapturingLogger();

    parseResponseLine('dnserr', logger);

    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe(LEVEL.warn);
    expect(records[0]?.response).toBe('dnserr');
    expect(records[0]?.msg).toBe('Unsupported response line');
  });

  it('should not log recognised status lines', () => {
    const { logger, records } = createCapturingLogger();

    parseResponse('good 1.2.3.4\nnochg 1.2.3.4', logger);

    expect(records).toEqual([]);
  });
});
