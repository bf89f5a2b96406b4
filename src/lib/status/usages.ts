/**
 * X.509 key usage decoders
 *
 * Turn the key usage bit-set and the extended key usage code list of a certificate
 * into the labels printed in the Secret section of a status report.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc5280#section-4.2.1.3
 * @see https://datatracker.ietf.org/doc/html/rfc5280#section-4.2.1.12
 */

import { UnknownExtKeyUsageError } from '../errors/status-errors.js';

/**
 * Key usage flag values, largest first, with their labels
 */
export const KEY_USAGE_LABELS: ReadonlyArray<readonly [number, string]> = [
  [256, 'Decipher Only'],
  [128, 'Encipher Only'],
  [64, 'CRL Sign'],
  [32, 'Cert Sign'],
  [16, 'Key Agreement'],
  [8, 'Data Encipherment'],
  [4, 'Key Encipherment'],
  [2, 'Content Commitment'],
  [1, 'Digital Signature'],
];

const KEY_USAGE_MASK = 0x1ff;

/** Labels indexed by extended key usage code */
export const EXT_KEY_USAGE_LABELS: readonly string[] = [
  'Any',
  'Server Authentication',
  'Client Authentication',
  'Code Signing',
  'Email Protection',
  'IPSEC End System',
  'IPSEC Tunnel',
  'IPSEC User',
  'Time Stamping',
  'OCSP Signing',
  'Microsoft Server Gated Crypto',
  'Netscape Server Gated Crypto',
  'Microsoft Commercial Code Signing',
  'Microsoft Kernel Code Signing',
];

/** Object identifiers indexed by extended key usage code */
export const EXT_KEY_USAGE_OIDS: readonly string[] = [
  '2.5.29.37.0',
  '1.3.6.1.5.5.7.3.1',
  '1.3.6.1.5.5.7.3.2',
  '1.3.6.1.5.5.7.3.3',
  '1.3.6.1.5.5.7.3.4',
  '1.3.6.1.5.5.7.3.5',
  '1.3.6.1.5.5.7.3.6',
  '1.3.6.1.5.5.7.3.7',
  '1.3.6.1.5.5.7.3.8',
  '1.3.6.1.5.5.7.3.9',
  '1.3.6.1.4.1.311.10.3.3',
  '2.16.840.1.113730.4.1',
  '1.3.6.1.4.1.311.2.1.22',
  '1.3.6.1.4.1.311.61.1.1',
];

export type UsageResult =
  | { ok: true; value: string }
  | { ok: false; error: UnknownExtKeyUsageError };

/**
 * Decompose a key usage bit-set into labels, lowest bit first.
 *
 * Walks the flag values from largest to smallest and stops as soon as the remainder is
 * exhausted. Bits above `Decipher Only` are ignored.
 */
export function keyUsageToLabels(bitset: number): string[] {
  let remaining = bitset & KEY_USAGE_MASK;
  const labels: string[] = [];

  for (const [value, label] of KEY_USAGE_LABELS) {
    if (remaining >= value) {
      remaining -= value;
      labels.push(label);
    }
    if (remaining === 0) {
      break;
    }
  }

  return labels.reverse();
}

export function keyUsageToString(bitset: number): string {
  return keyUsageToLabels(bitset).join(', ');
}

/**
 * Map extended key usage codes to a comma separated label list.
 * Fails on the first code without a label; no partial result is returned.
 */
export function extKeyUsageToLabels(codes: readonly number[]): UsageResult {
  const labels: string[] = [];

  for (const code of codes) {
    const label = Number.isInteger(code) ? EXT_KEY_USAGE_LABELS[code] : undefined;
    if (label === undefined) {
      return { ok: false, error: UnknownExtKeyUsageError.forCode(code) };
    }
    labels.push(label);
  }

  return { ok: true, value: labels.join(', ') };
}

/** Extended key usage code for an OID, or undefined when it has none */
export function extKeyUsageFromOid(oid: string): number | undefined {
  const code = EXT_KEY_USAGE_OIDS.indexOf(oid);
  return code === -1 ? undefined : code;
}
