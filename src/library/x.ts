import ms from 'ms';
import * as x from 'x-value';

export const Duration = x.union([x.string, x.integerRange({min: 1})]);

export type Duration = x.TypeOf<typeof Duration>;

/**
 * Converts a duration given as an `ms` string ("5m", "30s") or as milliseconds
 * to milliseconds. Returns `undefined` for anything that does not describe a
 * positive duration.
 */
export function toMilliseconds(duration: Duration): number | undefined {
  let value: number | undefined;

  if (typeof duration === 'number') {
    value = duration;
  } else if (duration.trim() !== '') {
    value = ms(duration.trim());
  }

  return value !== undefined && Number.isFinite(value) && value > 0
    ? value
    : undefined;
}

/**
 * Record shape of the LiveDNS v5 API.
 */
export const LiveDNSRecord = x.object({
  rrset_type: x.string.optional(),
  rrset_name: x.string.optional(),
  rrset_ttl: x.number.optional(),
  rrset_values: x.array(x.string).optional(),
});

export type LiveDNSRecord = x.TypeOf<typeof LiveDNSRecord>;

export type IPv4Address = string;
