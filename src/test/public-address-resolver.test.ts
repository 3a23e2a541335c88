import {
  InvalidAddressError,
  NoAddressFoundError,
  PublicAddressResolver,
  ResolutionFailureError,
  parseIPv4Address,
} from '../library/index.js';

function dnsError(code: string): Error {
  return Object.assign(new Error(`queryA ${code} myip.opendns.com`), {code});
}

describe('parseIPv4Address', () => {
  test('accepts ipv4 literals', () => {
    expect(parseIPv4Address('1.2.3.4')).toBe('1.2.3.4');
    expect(parseIPv4Address('255.255.255.255')).toBe('255.255.255.255');
    expect(parseIPv4Address('10.0.0.1\n')).toBe('10.0.0.1');
  });

  test.each(['', '::1', '2001:db8::1', 'not-an-ip', '256.1.1.1', '1.2.3'])(
    'rejects %j',
    value => {
      expect(() => parseIPv4Address(value)).toThrow(InvalidAddressError);
    },
  );
});

describe('PublicAddressResolver', () => {
  test('queries the probe hostname against the resolver', async () => {
    const query = vi.fn(async () => ['203.0.113.7']);

    const resolver = new PublicAddressResolver({query});

    await expect(resolver.resolve()).resolves.toBe('203.0.113.7');

    expect(query).toHaveBeenCalledWith(
      'myip.opendns.com',
      'resolver1.opendns.com',
      1000,
    );
  });

  test('uses the configured hostname and server', async () => {
    const query = vi.fn(async () => ['198.51.100.1']);

    const resolver = new PublicAddressResolver({
      hostname: 'whoami.example.net',
      server: '192.0.2.53',
      timeout: 250,
      query,
    });

    await resolver.resolve();

    expect(query).toHaveBeenCalledWith('whoami.example.net', '192.0.2.53', 250);
  });

  test('fails with NoAddressFound on an empty answer', async () => {
    const resolver = new PublicAddressResolver({query: async () => []});

    await expect(resolver.resolve()).rejects.toThrow(NoAddressFoundError);
  });

  test.each(['ENODATA', 'ENOTFOUND'])(
    'fails with NoAddressFound on %s',
    async code => {
      const resolver = new PublicAddressResolver({
        query: async () => {
          throw dnsError(code);
        },
      });

      await expect(resolver.resolve()).rejects.toThrow(NoAddressFoundError);
    },
  );

  test.each(['ETIMEOUT', 'ECONNREFUSED', 'ESERVFAIL'])(
    'fails with ResolutionFailure on %s',
    async code => {
      const cause = dnsError(code);

      const resolver = new PublicAddressResolver({
        query: async () => {
          throw cause;
        },
      });

      const error = await resolver.resolve().catch((error: unknown) => error);

      expect(error).toBeInstanceOf(ResolutionFailureError);
      expect(error).toHaveProperty('cause', cause);
      expect(error).toHaveProperty(
        'message',
        'failed to query myip.opendns.com against resolver1.opendns.com',
      );
    },
  );

  test('keeps errors raised by the query', async () => {
    const failure = new ResolutionFailureError(
      'myip.opendns.com',
      'resolver.invalid',
    );

    const resolver = new PublicAddressResolver({
      query: async () => {
        throw failure;
      },
    });

    await expect(resolver.resolve()).rejects.toBe(failure);
  });

  test('fails with InvalidAddress on an ipv6 answer', async () => {
    const resolver = new PublicAddressResolver({
      query: async () => ['2001:db8::1'],
    });

    await expect(resolver.resolve()).rejects.toThrow(InvalidAddressError);
  });

  test('never falls back to a previous address', async () => {
    const query = vi
      .fn(async (): Promise<string[]> => [])
      .mockResolvedValueOnce(['1.2.3.4']);

    const resolver = new PublicAddressResolver({query});

    await expect(resolver.resolve()).resolves.toBe('1.2.3.4');
    await expect(resolver.resolve()).rejects.toThrow(NoAddressFoundError);
  });
});
