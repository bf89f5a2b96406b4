/**
 * Certificate Status Report Types
 *
 * Every sub-report is a tagged union: either `ok: false` carrying only the lookup or
 * decode error, or `ok: true` carrying the populated fields. Fields of a failed
 * sub-report do not exist, so they cannot be read by accident.
 */

import type { Condition, EventList } from './kubernetes.js';

/**
 * Kinds of issuing authority a Certificate may reference
 */
export const ISSUER_KIND = {
  ISSUER: 'Issuer',
  CLUSTER_ISSUER: 'ClusterIssuer',
} as const;

export type IssuerKind = (typeof ISSUER_KIND)[keyof typeof ISSUER_KIND];

export function isIssuerKind(value: string): value is IssuerKind {
  return Object.values<string>(ISSUER_KIND).includes(value);
}

export interface FailedStatus {
  readonly ok: false;
  readonly error: Error;
}

export interface IssuerDetails {
  readonly ok: true;
  readonly name: string;
  readonly kind: IssuerKind;
  readonly conditions: readonly Condition[];
}

export type IssuerStatus = FailedStatus | IssuerDetails;

export interface SecretDetails {
  readonly ok: true;
  readonly name: string;
  readonly issuerCountry: readonly string[];
  readonly issuerOrganisation: readonly string[];
  readonly issuerCommonName: string;
  /** X.509 key usage bit-set, see {@link KEY_USAGE_LABELS} */
  readonly keyUsage: number;
  /** Extended key usage codes, see {@link EXT_KEY_USAGE_LABELS} */
  readonly extKeyUsage: readonly number[];
  /** Extended key usage OIDs with no known code */
  readonly unknownExtKeyUsage: readonly string[];
  readonly publicKeyAlgorithm: string;
  readonly signatureAlgorithm: string;
  readonly subjectKeyId: Uint8Array;
  readonly authorityKeyId: Uint8Array;
  readonly serialNumber: bigint;
}

export type SecretStatus = FailedStatus | SecretDetails;

export interface CRDetails {
  readonly ok: true;
  readonly name: string;
  readonly namespace: string;
  readonly conditions: readonly Condition[];
  readonly events?: EventList;
}

export type CRStatus = FailedStatus | CRDetails;

/**
 * Aggregated status of a Certificate and the resources around it.
 * Produced by `CertificateStatusBuilder.build()` and frozen.
 */
export interface CertificateStatus {
  readonly name: string;
  readonly namespace: string;
  /** RFC 3339 creation timestamp of the Certificate */
  readonly creationTime?: string;
  readonly conditions: readonly Condition[];
  readonly dnsNames: readonly string[];
  readonly events?: EventList;
  readonly notBefore?: string;
  readonly notAfter?: string;
  readonly renewalTime?: string;

  readonly issuerKind: string;
  readonly issuerStatus?: IssuerStatus;
  readonly secretStatus?: SecretStatus;
  readonly crStatus?: CRStatus;
}

export function failed(error: Error): FailedStatus {
  return { ok: false, error };
}
