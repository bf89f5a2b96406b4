import { describe, it, expect } from '@jest/globals';
import {
  CertificateStatusBuilder,
  renderCRStatus,
  renderConditions,
  renderIssuerStatus,
  renderSecretStatus,
  type EventDescriber,
  type EventList,
  type SecretDetails,
} from '../../src/index.js';
import { createTestCertificate, pemSecret } from '../utils/certificates.js';

const countingDescriber: EventDescriber = {
  describe: (events: EventList | undefined, indent: number) =>
    `<${events?.items.length ?? 0} events at level ${indent}>\n`,
};

const secretDetails: SecretDetails = {
  ok: true,
  name: 'web-tls',
  issuerCountry: ['GB', 'IE'],
  issuerOrganisation: ['Example Org'],
  issuerCommonName: 'Example CA',
  keyUsage: 1 | 32,
  extKeyUsage: [0],
  unknownExtKeyUsage: [],
  publicKeyAlgorithm: 'RSA',
  signatureAlgorithm: 'SHA256-RSA',
  subjectKeyId: new Uint8Array([0xde, 0xad, 0xbe, 0xef]),
  authorityKeyId: new Uint8Array([0x01, 0x02]),
  serialNumber: 4096n,
};

describe('renderConditions', () => {
  it('prints a placeholder when there are no conditions', () => {
    expect(renderConditions([])).toBe('    No Conditions set\n');
  });

  it('prints one line per condition in order', () => {
    expect(
      renderConditions([
        { type: 'Ready', status: 'True', reason: 'Issued', message: 'Certificate issued' },
        { type: 'Issuing', status: 'False' },
      ]),
    ).toBe(
      '    Ready: True, Reason: Issued, Message: Certificate issued\n' +
        '    Issuing: False, Reason: , Message: \n',
    );
  });

  it('indents by nesting level', () => {
    expect(renderConditions([], 1)).toBe('  No Conditions set\n');
  });
});

describe('renderIssuerStatus', () => {
  it('prints the issuer template', () => {
    const status = new CertificateStatusBuilder('web')
      .withIssuer({
        metadata: { name: 'ca-issuer' },
        status: { conditions: [{ type: 'Ready', status: 'True', reason: 'Issued', message: 'Certificate issued' }] },
      })
      .build();
    if (!status.issuerStatus) throw new Error('issuer status missing');

    expect(renderIssuerStatus(status.issuerStatus)).toBe(
      'Issuer:\n' +
        '  Name: ca-issuer\n' +
        '  Kind: Issuer\n' +
        '  Conditions:\n' +
        '    Ready: True, Reason: Issued, Message: Certificate issued\n',
    );
  });

  it('prints No Conditions set for a fresh issuer', () => {
    const text = renderIssuerStatus({ ok: true, name: 'letsencrypt', kind: 'ClusterIssuer', conditions: [] });
    expect(text).toContain('  Kind: ClusterIssuer\n');
    expect(text.endsWith('  Conditions:\n    No Conditions set\n')).toBe(true);
  });

  it('prints only the error of a failed report', () => {
    expect(renderIssuerStatus({ ok: false, error: new Error('issuer "ca" not found') })).toBe(
      'issuer "ca" not found',
    );
  });
});

describe('renderSecretStatus', () => {
  it('prints the decoded certificate fields', () => {
    expect(renderSecretStatus(secretDetails)).toBe(
      'Secret:\n' +
        '  Name: web-tls\n' +
        '  Issuer Country: GB, IE\n' +
        '  Issuer Organisation: Example Org\n' +
        '  Issuer Common Name: Example CA\n' +
        '  Key Usage: Digital Signature, Cert Sign\n' +
        '  Extended Key Usages: Any\n' +
        '  Public Key Algorithm: RSA\n' +
        '  Signature Algorithm: SHA256-RSA\n' +
        '  Subject Key ID: deadbeef\n' +
        '  Authority Key ID: 0102\n' +
        '  Serial Number: 1000\n',
    );
  });

  it('substitutes the decoder error for unknown extended usages', () => {
    const text = renderSecretStatus({ ...secretDetails, extKeyUsage: [1, 14] });
    expect(text).toContain(
      '  Extended Key Usages: error when converting Extended Usages to string: encountered unknown Extended Usage with code 14\n',
    );
    expect(text).toContain('  Serial Number: 1000\n');
  });

  it('renders a generated certificate', async () => {
    const cert = await createTestCertificate();
    const status = new CertificateStatusBuilder('web').withSecret(pemSecret('web-tls', cert)).build();
    if (!status.secretStatus) throw new Error('secret status missing');

    expect(renderSecretStatus(status.secretStatus)).toBe(
      'Secret:\n' +
        '  Name: web-tls\n' +
        '  Issuer Country: GB\n' +
        '  Issuer Organisation: Example Org\n' +
        '  Issuer Common Name: Test CA\n' +
        '  Key Usage: Digital Signature, Key Encipherment\n' +
        '  Extended Key Usages: Server Authentication, Client Authentication\n' +
        '  Public Key Algorithm: ECDSA\n' +
        '  Signature Algorithm: ECDSA-SHA256\n' +
        '  Subject Key ID: 0a0b0c0d\n' +
        '  Authority Key ID: 0a0b0c0d\n' +
        '  Serial Number: ff\n',
    );
  });

  it('prints only the error of a failed report', () => {
    const status = new CertificateStatusBuilder('web')
      .withSecret({ metadata: { name: 'web-tls' }, data: {} })
      .build();
    if (!status.secretStatus) throw new Error('secret status missing');

    expect(renderSecretStatus(status.secretStatus)).toBe(`error: 'tls.crt' of Secret "web-tls" is not set`);
  });
});

describe('renderCRStatus', () => {
  it('appends the described events', () => {
    const status = new CertificateStatusBuilder('web')
      .withCR(
        { metadata: { name: 'web-1', namespace: 'default' } },
        { items: [{ reason: 'Approved' }, { reason: 'Issued' }] },
      )
      .build();
    if (!status.crStatus) throw new Error('request status missing');

    expect(renderCRStatus(status.crStatus, countingDescriber)).toBe(
      'CertificateRequest:\n' +
        '  Name: web-1\n' +
        '  Namespace: default\n' +
        '  Conditions:\n' +
        '    No Conditions set\n' +
        '<2 events at level 1>\n',
    );
  });

  it('prints only the error of a failed report', () => {
    expect(renderCRStatus({ ok: false, error: new Error('forbidden') }, countingDescriber)).toBe('forbidden');
  });
});
