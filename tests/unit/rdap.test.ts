import axios from 'axios';
import {
  lookupRdap,
  rdapUrlFor,
  extractRegistrar,
  extractEventDates,
} from '../../src/lookups/rdap';
import { RdapLookupError } from '../../src/utils/errors';

jest.mock('axios');

const mockedAxios = axios as jest.Mocked<typeof axios>;

/**
 * Answer with `status`, applying the caller's validateStatus the way axios
 * does: a rejected status becomes a thrown error carrying the response.
 */
function respondWith(status: number, data: unknown = {}): void {
  mockedAxios.isAxiosError.mockImplementation(
    (payload) => payload instanceof Error && 'response' in payload,
  );
  mockedAxios.get.mockImplementation(async (_url, requestConfig) => {
    if (requestConfig?.validateStatus && !requestConfig.validateStatus(status)) {
      throw Object.assign(new Error(`Request failed with status code ${status}`), {
        code: 'ERR_BAD_RESPONSE',
        response: { status, data },
      });
    }
    return { status, data };
  });
}

const registeredRecord = {
  objectClassName: 'domain',
  ldhName: 'EXAMPLE.COM',
  entities: [
    {
      roles: ['registrant'],
      vcardArray: ['vcard', [['fn', {}, 'text', 'Someone Else']]],
    },
    {
      roles: ['registrar'],
      vcardArray: [
        'vcard',
        [
          ['version', {}, 'text', '4.0'],
          ['fn', {}, 'text', 'Test Registrar LLC'],
        ],
      ],
    },
  ],
  events: [
    { eventAction: 'registration', eventDate: '2001-02-03T04:05:06Z' },
    { eventAction: 'last changed', eventDate: '2020-01-01T00:00:00Z' },
    { eventAction: 'expiration', eventDate: '2030-02-03T04:05:06Z' },
  ],
};

describe('rdapUrlFor', () => {
  it('queries Verisign directly for .com and .net', () => {
    expect(rdapUrlFor('example.com')).toBe(
      'https://rdap.verisign.com/com/v1/domain/example.com',
    );
    expect(rdapUrlFor('example.net')).toBe(
      'https://rdap.verisign.com/net/v1/domain/example.net',
    );
  });

  it('queries PIR for .org and SWITCH for .ch / .li', () => {
    expect(rdapUrlFor('example.org')).toBe(
      'https://rdap.publicinterestregistry.org/rdap/domain/example.org',
    );
    expect(rdapUrlFor('example.ch')).toBe('https://rdap.nic.ch/domain/example.ch');
    expect(rdapUrlFor('example.li')).toBe('https://rdap.nic.li/domain/example.li');
  });

  it('falls back to rdap.org for other TLDs', () => {
    expect(rdapUrlFor('example.io')).toBe('https://rdap.org/domain/example.io');
  });
});

describe('extractRegistrar', () => {
  it('reads fn from the registrar entity', () => {
    expect(extractRegistrar(registeredRecord)).toBe('Test Registrar LLC');
  });

  it('accepts a structured org value', () => {
    const record = {
      entities: [
        {
          roles: ['registrar'],
          vcardArray: ['vcard', [['org', {}, 'text', ['Org Registrar Inc', 'Unit']]]],
        },
      ],
    };
    expect(extractRegistrar(record)).toBe('Org Registrar Inc');
  });

  it('returns undefined without a registrar entity', () => {
    expect(extractRegistrar({ entities: [{ roles: ['registrant'] }] })).toBeUndefined();
    expect(extractRegistrar({})).toBeUndefined();
  });
});

describe('extractEventDates', () => {
  it('maps registration and expiration events', () => {
    expect(extractEventDates(registeredRecord)).toEqual({
      registeredAt: '2001-02-03T04:05:06Z',
      expiresAt: '2030-02-03T04:05:06Z',
    });
  });

  it('returns an empty object without events', () => {
    expect(extractEventDates({})).toEqual({});
  });
});

describe('lookupRdap', () => {
  beforeEach(() => {
    mockedAxios.get.mockReset();
    mockedAxios.isAxiosError.mockReset();
    mockedAxios.isAxiosError.mockReturnValue(false);
  });

  it('returns the record on 200', async () => {
    mockedAxios.get.mockResolvedValue({ status: 200, data: registeredRecord });

    const result = await lookupRdap('example.com');

    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.record.ldhName).toBe('EXAMPLE.COM');
      expect(result.url).toBe('https://rdap.verisign.com/com/v1/domain/example.com');
    }
    expect(mockedAxios.get).toHaveBeenCalledWith(
      'https://rdap.verisign.com/com/v1/domain/example.com',
      expect.objectContaining({
        timeout: 5000,
        headers: {
          Accept: 'application/rdap+json',
          'User-Agent': 'DomainCheckerBot/1.0',
        },
      }),
    );
  });

  it('treats 404 as not found', async () => {
    respondWith(404);

    await expect(lookupRdap('unclaimed-name.io')).resolves.toEqual({
      status: 'not_found',
      url: 'https://rdap.org/domain/unclaimed-name.io',
      httpStatus: 404,
    });
  });

  it('treats 410 as not found', async () => {
    respondWith(410);

    const result = await lookupRdap('example.io');
    expect(result.status).toBe('not_found');
  });

  it('reports a 429 rate limit as an error, not an absence', async () => {
    respondWith(429);

    const result = await lookupRdap('example.io');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error).toBeInstanceOf(RdapLookupError);
      expect(result.error.code).toBe('RDAP_ERROR');
      expect(result.error.message).toBe(
        'RDAP lookup failed for example.io: Request failed with status code 429',
      );
    }
  });

  it('reports a 503 as an error with its status', async () => {
    respondWith(503);

    const result = await lookupRdap('example.com');

    expect(result.status).toBe('error');
    if (result.status === 'error' && result.error instanceof RdapLookupError) {
      expect(result.error.statusCode).toBe(503);
    } else {
      throw new Error('expected an RdapLookupError');
    }
  });

  it('reports a 403 that slips past validateStatus as an error', async () => {
    mockedAxios.get.mockResolvedValue({ status: 403, data: {} });

    const result = await lookupRdap('example.com');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.message).toBe('RDAP lookup failed for example.com: Unexpected HTTP 403');
    }
  });

  it('reports a malformed body as an error', async () => {
    mockedAxios.get.mockResolvedValue({ status: 200, data: '<html>oops</html>' });

    const result = await lookupRdap('example.com');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('RDAP_ERROR');
      expect(result.error.message).toBe(
        'RDAP lookup failed for example.com: Malformed RDAP response',
      );
    }
  });

  it('maps axios timeouts to TIMEOUT', async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.get.mockRejectedValue({ code: 'ECONNABORTED', message: 'timeout of 5000ms exceeded' });

    const result = await lookupRdap('example.com');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('TIMEOUT');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('maps other network failures to RDAP_ERROR', async () => {
    mockedAxios.isAxiosError.mockReturnValue(true);
    mockedAxios.get.mockRejectedValue({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

    const result = await lookupRdap('example.org');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('RDAP_ERROR');
      expect(result.error.message).toBe('RDAP lookup failed for example.org: connect ECONNREFUSED');
    }
  });

  it('maps non-axios errors to RDAP_ERROR', async () => {
    mockedAxios.get.mockRejectedValue(new Error('socket hang up'));

    const result = await lookupRdap('example.net');

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('RDAP_ERROR');
      expect(result.error.message).toBe('RDAP lookup failed for example.net: socket hang up');
    }
  });
});
