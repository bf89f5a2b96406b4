import {
  AuthorityKeyIdentifierExtension,
  ExtendedKeyUsage,
  ExtendedKeyUsageExtension,
  KeyUsageFlags,
  KeyUsagesExtension,
  SubjectKeyIdentifierExtension,
  X509CertificateGenerator,
  cryptoProvider,
  type Extension,
  type X509Certificate,
} from '@peculiar/x509';
import type { Secret } from '../../src/index.js';

// Bind Node's WebCrypto for @peculiar/x509
cryptoProvider.set(crypto);

const signingAlgorithm = { name: 'ECDSA', namedCurve: 'P-256', hash: 'SHA-256' };

export interface TestCertificateOptions {
  /** Hex encoded DER INTEGER content */
  serialNumber?: string;
  name?: string;
  extensions?: Extension[];
}

export const TEST_KEY_ID = '0a0b0c0d';

export function defaultExtensions(): Extension[] {
  return [
    new KeyUsagesExtension(KeyUsageFlags.digitalSignature | KeyUsageFlags.keyEncipherment, true),
    new ExtendedKeyUsageExtension([ExtendedKeyUsage.serverAuth, ExtendedKeyUsage.clientAuth]),
    new SubjectKeyIdentifierExtension(TEST_KEY_ID),
    new AuthorityKeyIdentifierExtension(TEST_KEY_ID),
  ];
}

/** Self-signed ECDSA P-256 certificate */
export async function createTestCertificate(
  options: TestCertificateOptions = {},
): Promise<X509Certificate> {
  const keys = await crypto.subtle.generateKey(signingAlgorithm, true, ['sign', 'verify']);
  return X509CertificateGenerator.createSelfSigned({
    serialNumber: options.serialNumber ?? '00ff',
    name: options.name ?? 'C=GB, O=Example Org, CN=Test CA',
    notBefore: new Date('2024-01-01T00:00:00Z'),
    notAfter: new Date('2034-01-01T00:00:00Z'),
    signingAlgorithm,
    keys,
    extensions: options.extensions ?? defaultExtensions(),
  });
}

/** Secret whose `tls.crt` holds the given bytes, base64 encoded as the API server serves it */
export function tlsSecret(name: string, certBytes: Uint8Array | string): Secret {
  return {
    metadata: { name, namespace: 'default' },
    data: {
      'tls.crt': (typeof certBytes === 'string'
        ? Buffer.from(certBytes, 'utf-8')
        : Buffer.from(certBytes)
      ).toString('base64'),
    },
  };
}

export function pemSecret(name: string, cert: X509Certificate): Secret {
  return tlsSecret(name, cert.toString('pem'));
}

export function derSecret(name: string, cert: X509Certificate): Secret {
  return tlsSecret(name, new Uint8Array(cert.rawData));
}
