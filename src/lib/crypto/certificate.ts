/**
 * X.509 certificate decoding for status reports
 *
 * Extracts the issuer, usage, algorithm and identifier fields shown in the Secret
 * section of a Certificate status. Accepts PEM (first CERTIFICATE block) or raw DER.
 */

import { AsnConvert } from '@peculiar/asn1-schema';
import { Certificate as AsnCertificate } from '@peculiar/asn1-x509';
import {
  AuthorityKeyIdentifierExtension,
  ExtendedKeyUsageExtension,
  KeyUsagesExtension,
  PemConverter,
  SubjectKeyIdentifierExtension,
  X509Certificate,
  type PemStruct,
} from '@peculiar/x509';
import { CertificateDecodeError } from '../errors/status-errors.js';
import { extKeyUsageFromOid } from '../status/usages.js';
import { debugCrypto } from '../utils/debug.js';
import { logWarn } from '../../logger.js';

const PUBLIC_KEY_ALGORITHMS: Readonly<Record<string, string>> = {
  '1.2.840.113549.1.1.1': 'RSA',
  '1.2.840.10040.4.1': 'DSA',
  '1.2.840.10045.2.1': 'ECDSA',
  '1.3.101.112': 'Ed25519',
};

const SIGNATURE_ALGORITHMS: Readonly<Record<string, string>> = {
  '1.2.840.113549.1.1.2': 'MD2-RSA',
  '1.2.840.113549.1.1.4': 'MD5-RSA',
  '1.2.840.113549.1.1.5': 'SHA1-RSA',
  '1.2.840.113549.1.1.10': 'RSAPSS',
  '1.2.840.113549.1.1.11': 'SHA256-RSA',
  '1.2.840.113549.1.1.12': 'SHA384-RSA',
  '1.2.840.113549.1.1.13': 'SHA512-RSA',
  '1.2.840.10040.4.3': 'DSA-SHA1',
  '2.16.840.1.101.3.4.3.2': 'DSA-SHA256',
  '1.2.840.10045.4.1': 'ECDSA-SHA1',
  '1.2.840.10045.4.3.2': 'ECDSA-SHA256',
  '1.2.840.10045.4.3.3': 'ECDSA-SHA384',
  '1.2.840.10045.4.3.4': 'ECDSA-SHA512',
  '1.3.101.112': 'Ed25519',
};

const PEM_MARKER = '-----BEGIN';
const PEM_CERTIFICATE_TYPE = 'CERTIFICATE';

export interface ParsedCertificate {
  issuerCountry: string[];
  issuerOrganisation: string[];
  issuerCommonName: string;
  keyUsage: number;
  extKeyUsage: number[];
  unknownExtKeyUsage: string[];
  publicKeyAlgorithm: string;
  signatureAlgorithm: string;
  subjectKeyId: Uint8Array;
  authorityKeyId: Uint8Array;
  serialNumber: bigint;
}

/** Algorithm name for a public key OID; unknown OIDs are returned as-is */
export function publicKeyAlgorithmName(oid: string): string {
  return PUBLIC_KEY_ALGORITHMS[oid] ?? oid;
}

/** Algorithm name for a signature OID; unknown OIDs are returned as-is */
export function signatureAlgorithmName(oid: string): string {
  return SIGNATURE_ALGORITHMS[oid] ?? oid;
}

/**
 * Interpret DER INTEGER content octets (two's complement, big-endian) as a bigint
 */
export function bytesToSignedBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    return 0n;
  }
  const magnitude = BigInt(`0x${Buffer.from(bytes).toString('hex')}`);
  if ((bytes[0] & 0x80) === 0) {
    return magnitude;
  }
  return magnitude - (1n << BigInt(bytes.length * 8));
}

/**
 * Lowercase hex of the big-endian magnitude, whole bytes only ("" for zero)
 */
export function serialNumberToHex(serial: bigint): string {
  const magnitude = serial < 0n ? -serial : serial;
  if (magnitude === 0n) {
    return '';
  }
  const hex = magnitude.toString(16);
  return hex.length % 2 === 0 ? hex : `0${hex}`;
}

function hexToBytes(hex: string | undefined): Uint8Array {
  return hex ? new Uint8Array(Buffer.from(hex, 'hex')) : new Uint8Array(0);
}

function toDer(bytes: Uint8Array): ArrayBuffer {
  const text = Buffer.from(bytes).toString('latin1');
  if (!text.includes(PEM_MARKER)) {
    const der = new ArrayBuffer(bytes.length);
    new Uint8Array(der).set(bytes);
    return der;
  }

  let blocks: PemStruct[];
  try {
    blocks = PemConverter.decodeWithHeaders(text);
  } catch (e) {
    debugCrypto('PEM decode failed: %s', e instanceof Error ? e.message : String(e));
    throw CertificateDecodeError.noPemBlock();
  }
  const block = blocks.find((b) => b.type === PEM_CERTIFICATE_TYPE);
  if (!block) {
    debugCrypto('no %s block among %d PEM blocks', PEM_CERTIFICATE_TYPE, blocks.length);
    throw CertificateDecodeError.noPemBlock();
  }
  return block.rawData;
}

/**
 * Decode PEM or DER certificate bytes into the fields reported for a Secret.
 *
 * @throws CertificateDecodeError when the bytes are empty, hold no PEM block or are not a certificate
 */
export function decodeX509CertificateBytes(bytes: Uint8Array): ParsedCertificate {
  if (bytes.length === 0) {
    throw CertificateDecodeError.empty();
  }

  const der = toDer(bytes);

  let cert: X509Certificate;
  let asn: AsnCertificate;
  try {
    cert = new X509Certificate(der);
    asn = AsnConvert.parse(der, AsnCertificate);
  } catch (e) {
    throw CertificateDecodeError.invalid(e instanceof Error ? e.message : String(e));
  }

  const extKeyUsage: number[] = [];
  const unknownExtKeyUsage: string[] = [];
  for (const usage of cert.getExtension(ExtendedKeyUsageExtension)?.usages ?? []) {
    const oid = typeof usage === 'string' ? usage : String(usage);
    const code = extKeyUsageFromOid(oid);
    if (code === undefined) {
      unknownExtKeyUsage.push(oid);
    } else {
      extKeyUsage.push(code);
    }
  }
  if (unknownExtKeyUsage.length > 0) {
    logWarn(`certificate has unrecognised extended key usages: ${unknownExtKeyUsage.join(', ')}`);
  }

  const commonNames = cert.issuerName.getField('CN');
  const parsed: ParsedCertificate = {
    issuerCountry: cert.issuerName.getField('C'),
    issuerOrganisation: cert.issuerName.getField('O'),
    issuerCommonName: commonNames[commonNames.length - 1] ?? '',
    keyUsage: cert.getExtension(KeyUsagesExtension)?.usages ?? 0,
    extKeyUsage,
    unknownExtKeyUsage,
    publicKeyAlgorithm: publicKeyAlgorithmName(
      asn.tbsCertificate.subjectPublicKeyInfo.algorithm.algorithm,
    ),
    signatureAlgorithm: signatureAlgorithmName(asn.signatureAlgorithm.algorithm),
    subjectKeyId: hexToBytes(cert.getExtension(SubjectKeyIdentifierExtension)?.keyId),
    authorityKeyId: hexToBytes(cert.getExtension(AuthorityKeyIdentifierExtension)?.keyId),
    serialNumber: bytesToSignedBigInt(new Uint8Array(asn.tbsCertificate.serialNumber)),
  };

  debugCrypto(
    'decoded certificate issued by %s (serial %s)',
    parsed.issuerCommonName,
    serialNumberToHex(parsed.serialNumber),
  );
  return parsed;
}
