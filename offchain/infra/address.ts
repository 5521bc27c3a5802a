import { getAddress, type Address, type Hex } from 'viem';
import { z } from 'zod';

function withHexPrefix(value: string): Hex {
  return /^0x/i.test(value) ? `0x${value.slice(2)}` : `0x${value}`;
}

// Accepts the address with or without 0x, as it is commonly pasted into .env files
export const EvmAddressSchema = z
  .string()
  .trim()
  .transform(withHexPrefix)
  .pipe(z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 20-byte hex address'))
  .transform((value): Address => getAddress(value));

export const PrivateKeySchema = z
  .string()
  .trim()
  .transform(withHexPrefix)
  .pipe(z.string().regex(/^0x[a-fA-F0-9]{64}$/, 'must be a 32-byte hex key'))
  .transform(withHexPrefix);
