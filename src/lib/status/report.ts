import type { CertificateStatus } from '../types/status.js';
import {
  renderCRStatus,
  renderConditions,
  renderIssuerStatus,
  renderSecretStatus,
  type EventDescriber,
} from './render.js';

const NO_CERTIFICATE_REQUEST = 'No CertificateRequest found for this Certificate\n';

function block(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Full `status certificate` view: Certificate details followed by the issuer, Secret
 * and CertificateRequest sections.
 */
export function renderCertificateStatus(
  status: CertificateStatus,
  describer: EventDescriber,
): string {
  let out = `Name: ${status.name}\n` + `Namespace: ${status.namespace}\n`;
  if (status.creationTime) {
    out += `Created at: ${status.creationTime}\n`;
  }

  out += 'Conditions:\n' + renderConditions(status.conditions, 1);

  out += 'DNS Names:\n';
  out += status.dnsNames.map((name) => `- ${name}\n`).join('');

  out += describer.describe(status.events, 0);

  if (status.issuerStatus) {
    out += block(renderIssuerStatus(status.issuerStatus));
  }
  if (status.secretStatus) {
    out += block(renderSecretStatus(status.secretStatus));
  }

  if (status.notBefore) {
    out += `Not Before: ${status.notBefore}\n`;
  }
  if (status.notAfter) {
    out += `Not After: ${status.notAfter}\n`;
  }
  if (status.renewalTime) {
    out += `Renewal Time: ${status.renewalTime}\n`;
  }

  out += status.crStatus ? block(renderCRStatus(status.crStatus, describer)) : NO_CERTIFICATE_REQUEST;
  return out;
}
