/**
 * Text rendering of status sub-reports
 *
 * A failed sub-report renders as its error message and nothing else.
 */

import type { Condition, EventList } from '../types/kubernetes.js';
import type { CRStatus, IssuerStatus, SecretStatus } from '../types/status.js';
import { serialNumberToHex } from '../crypto/certificate.js';
import { extKeyUsageToLabels, keyUsageToString } from './usages.js';

/**
 * Produces the event table appended to a CertificateRequest section
 */
export interface EventDescriber {
  /**
   * @param indent - nesting level; each level is two spaces
   */
  describe(events: EventList | undefined, indent: number): string;
}

/**
 * One `Type: Status, Reason: …, Message: …` line per condition, in the order given.
 *
 * @param level - nesting level; each level is two spaces
 */
export function renderConditions(conditions: readonly Condition[], level = 2): string {
  const indent = '  '.repeat(level);
  if (conditions.length === 0) {
    return `${indent}No Conditions set\n`;
  }
  return conditions
    .map(
      (c) =>
        `${indent}${c.type}: ${c.status}, Reason: ${c.reason ?? ''}, Message: ${c.message ?? ''}\n`,
    )
    .join('');
}

export function renderIssuerStatus(status: IssuerStatus): string {
  if (!status.ok) {
    return status.error.message;
  }

  return (
    'Issuer:\n' +
    `  Name: ${status.name}\n` +
    `  Kind: ${status.kind}\n` +
    '  Conditions:\n' +
    renderConditions(status.conditions)
  );
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function renderSecretStatus(status: SecretStatus): string {
  if (!status.ok) {
    return status.error.message;
  }

  const extKeyUsage = extKeyUsageToLabels(status.extKeyUsage);
  const rows: Array<[string, string]> = [
    ['Name', status.name],
    ['Issuer Country', status.issuerCountry.join(', ')],
    ['Issuer Organisation', status.issuerOrganisation.join(', ')],
    ['Issuer Common Name', status.issuerCommonName],
    ['Key Usage', keyUsageToString(status.keyUsage)],
    ['Extended Key Usages', extKeyUsage.ok ? extKeyUsage.value : extKeyUsage.error.message],
    ['Public Key Algorithm', status.publicKeyAlgorithm],
    ['Signature Algorithm', status.signatureAlgorithm],
    ['Subject Key ID', toHex(status.subjectKeyId)],
    ['Authority Key ID', toHex(status.authorityKeyId)],
    ['Serial Number', serialNumberToHex(status.serialNumber)],
  ];

  return 'Secret:\n' + rows.map(([label, value]) => `  ${label}: ${value}\n`).join('');
}

export function renderCRStatus(status: CRStatus, describer: EventDescriber): string {
  if (!status.ok) {
    return status.error.message;
  }

  return (
    'CertificateRequest:\n' +
    `  Name: ${status.name}\n` +
    `  Namespace: ${status.namespace}\n` +
    '  Conditions:\n' +
    renderConditions(status.conditions) +
    describer.describe(status.events, 1)
  );
}
