import { z } from 'zod';

const emailAddress = z.string().email();

/**
 * Address part of a recipient written either bare or as `Name <addr>`.
 * Undefined when the address is not a valid email.
 */
export function mailboxAddress(value: string): string | undefined {
  const named = /^[^<>]*<([^<>]+)>$/.exec(value.trim());
  const address = (named ? named[1] : value).trim();
  return emailAddress.safeParse(address).success ? address : undefined;
}
