import { describe, it, expect } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import {
  CertificateStatusBuilder,
  KubectlEventDescriber,
  loadStatusBundle,
  renderCertificateStatus,
} from '../../src/index.js';

const describer = new KubectlEventDescriber({ now: () => new Date('2024-03-01T00:00:00Z') });

describe('renderCertificateStatus', () => {
  it('renders every section of a bundle', () => {
    const bundle = readFileSync(join(__dirname, '..', 'fixtures', 'web-bundle.json'), 'utf-8');
    const status = loadStatusBundle(bundle);

    expect(renderCertificateStatus(status, describer)).toBe(
      [
        'Name: web',
        'Namespace: default',
        'Created at: 2024-01-01T00:00:00Z',
        'Conditions:',
        '  Ready: True, Reason: Ready, Message: Certificate is up to date and has not expired',
        'DNS Names:',
        '- example.com',
        'Events:  <none>',
        'Issuer:',
        '  Name: ca-issuer',
        '  Kind: Issuer',
        '  Conditions:',
        '    No Conditions set',
        'secrets "web-tls" not found',
        'Not Before: 2024-01-01T00:00:00Z',
        'Not After: 2024-04-01T00:00:00Z',
        'Renewal Time: 2024-03-02T00:00:00Z',
        'CertificateRequest:',
        '  Name: web-1',
        '  Namespace: default',
        '  Conditions:',
        '    No Conditions set',
        '  Events:  <none>',
        '',
      ].join('\n'),
    );
  });

  it('notes a missing CertificateRequest', () => {
    const status = new CertificateStatusBuilder('web', 'default').build();

    expect(renderCertificateStatus(status, describer)).toBe(
      [
        'Name: web',
        'Namespace: default',
        'Conditions:',
        '  No Conditions set',
        'DNS Names:',
        'Events:  <none>',
        'No CertificateRequest found for this Certificate',
        '',
      ].join('\n'),
    );
  });
});
