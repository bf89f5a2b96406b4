/**
 * Certificate status builder
 *
 * Accumulates the results of the independent lookups made while describing a
 * Certificate (issuer, Secret, latest CertificateRequest) into one report. Each lookup
 * may fail on its own: its error is stored on the matching sub-report and never
 * touches the other ones.
 *
 * A builder is mutable and owned by a single status collection; `build()` returns a
 * frozen snapshot.
 */

import { TLS_CERT_KEY } from '../types/kubernetes.js';
import type {
  Certificate,
  CertificateRequest,
  ClusterIssuer,
  Condition,
  EventList,
  Issuer,
  Secret,
} from '../types/kubernetes.js';
import {
  ISSUER_KIND,
  failed,
  type CRStatus,
  type CertificateStatus,
  type IssuerKind,
  type IssuerStatus,
  type SecretStatus,
} from '../types/status.js';
import {
  CertificateDecodeError,
  CertificateParseError,
  SecretDataMissingError,
} from '../errors/status-errors.js';
import { decodeX509CertificateBytes, type ParsedCertificate } from '../crypto/certificate.js';
import { debugStatus } from '../utils/debug.js';

type Lookup<T> = T | null | undefined;

/** Padded standard base64, as the API server serves Secret data */
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export class CertificateStatusBuilder {
  name: string;
  namespace: string;
  creationTime?: string;
  conditions: Condition[] = [];
  dnsNames: string[] = [];
  events?: EventList;
  notBefore?: string;
  notAfter?: string;
  renewalTime?: string;

  issuerKind: string = ISSUER_KIND.ISSUER;
  issuerStatus?: IssuerStatus;
  secretStatus?: SecretStatus;
  crStatus?: CRStatus;

  constructor(name: string, namespace = '') {
    this.name = name;
    this.namespace = namespace;
  }

  /**
   * Seed a builder with the identity, conditions and validity window of a Certificate.
   * The issuer kind comes from `spec.issuerRef.kind`, defaulting to `Issuer`.
   */
  static fromCertificate(crt: Certificate): CertificateStatusBuilder {
    const builder = new CertificateStatusBuilder(crt.metadata.name, crt.metadata.namespace);
    builder.creationTime = crt.metadata.creationTimestamp;
    builder.conditions = cloneConditions(crt.status?.conditions);
    builder.dnsNames = [...(crt.spec.dnsNames ?? [])];
    builder.notBefore = crt.status?.notBefore;
    builder.notAfter = crt.status?.notAfter;
    builder.renewalTime = crt.status?.renewalTime;
    return builder.withIssuerKind(crt.spec.issuerRef.kind || ISSUER_KIND.ISSUER);
  }

  withEvents(events: EventList | undefined): this {
    this.events = events;
    return this;
  }

  withIssuerKind(kind: string): this {
    this.issuerKind = kind;
    return this;
  }

  withIssuer(issuer: Lookup<Issuer>, err?: Error | null): this {
    return this.setIssuer(ISSUER_KIND.ISSUER, issuer, err);
  }

  withClusterIssuer(clusterIssuer: Lookup<ClusterIssuer>, err?: Error | null): this {
    return this.setIssuer(ISSUER_KIND.CLUSTER_ISSUER, clusterIssuer, err);
  }

  withSecret(secret: Lookup<Secret>, err?: Error | null): this {
    if (err) {
      debugStatus('secret lookup failed: %s', err.message);
      this.secretStatus = failed(err);
      return this;
    }
    if (!secret) {
      return this;
    }

    const secretName = secret.metadata.name;
    const encoded = secret.data?.[TLS_CERT_KEY] ?? '';
    if (encoded === '') {
      debugStatus('secret %s has no %s', secretName, TLS_CERT_KEY);
      this.secretStatus = failed(SecretDataMissingError.forSecret(secretName, TLS_CERT_KEY));
      return this;
    }

    let cert: ParsedCertificate;
    try {
      if (!BASE64_PATTERN.test(encoded)) {
        throw CertificateDecodeError.invalidBase64();
      }
      cert = decodeX509CertificateBytes(Buffer.from(encoded, 'base64'));
    } catch (e) {
      debugStatus('secret %s holds an unparseable certificate', secretName);
      this.secretStatus = failed(CertificateParseError.forSecret(secretName, TLS_CERT_KEY, e));
      return this;
    }

    this.secretStatus = {
      ok: true,
      name: secretName,
      issuerCountry: cert.issuerCountry,
      issuerOrganisation: cert.issuerOrganisation,
      issuerCommonName: cert.issuerCommonName,
      keyUsage: cert.keyUsage,
      extKeyUsage: cert.extKeyUsage,
      unknownExtKeyUsage: cert.unknownExtKeyUsage,
      publicKeyAlgorithm: cert.publicKeyAlgorithm,
      signatureAlgorithm: cert.signatureAlgorithm,
      subjectKeyId: cert.subjectKeyId,
      authorityKeyId: cert.authorityKeyId,
      serialNumber: cert.serialNumber,
    };
    return this;
  }

  /**
   * Record the latest CertificateRequest. Its events replace the report's event list.
   */
  withCR(req: Lookup<CertificateRequest>, events: EventList | undefined, err?: Error | null): this {
    if (err) {
      debugStatus('certificate request lookup failed: %s', err.message);
      this.crStatus = failed(err);
      return this;
    }
    if (!req) {
      return this;
    }

    this.events = cloneEvents(events);
    this.crStatus = {
      ok: true,
      name: req.metadata.name,
      namespace: req.metadata.namespace ?? '',
      conditions: cloneConditions(req.status?.conditions),
      events: cloneEvents(events),
    };
    return this;
  }

  /**
   * Snapshot the accumulated state. May be called at any time and repeatedly.
   */
  build(): CertificateStatus {
    return deepFreeze({
      name: this.name,
      namespace: this.namespace,
      creationTime: this.creationTime,
      conditions: cloneConditions(this.conditions),
      dnsNames: [...this.dnsNames],
      events: cloneEvents(this.events),
      notBefore: this.notBefore,
      notAfter: this.notAfter,
      renewalTime: this.renewalTime,
      issuerKind: this.issuerKind,
      issuerStatus: this.issuerStatus,
      secretStatus: cloneSecretStatus(this.secretStatus),
      crStatus: this.crStatus,
    });
  }

  private setIssuer(
    kind: IssuerKind,
    issuer: Lookup<Issuer | ClusterIssuer>,
    err: Error | null | undefined,
  ): this {
    if (err) {
      debugStatus('%s lookup failed: %s', kind, err.message);
      this.issuerStatus = failed(err);
      return this;
    }
    if (!issuer) {
      return this;
    }

    this.issuerStatus = {
      ok: true,
      name: issuer.metadata.name,
      kind,
      conditions: cloneConditions(issuer.status?.conditions),
    };
    return this;
  }
}

function cloneConditions(conditions: readonly Condition[] | undefined): Condition[] {
  return (conditions ?? []).map((c) => ({ ...c }));
}

function cloneEvents(events: EventList | undefined): EventList | undefined {
  return events && {
    items: events.items.map((e) => ({ ...e, source: e.source && { ...e.source } })),
  };
}

/** Copies the byte arrays too: typed arrays cannot be frozen, so snapshots must not share them */
function cloneSecretStatus(status: SecretStatus | undefined): SecretStatus | undefined {
  if (!status?.ok) {
    return status;
  }
  return {
    ...status,
    issuerCountry: [...status.issuerCountry],
    issuerOrganisation: [...status.issuerOrganisation],
    extKeyUsage: [...status.extKeyUsage],
    unknownExtKeyUsage: [...status.unknownExtKeyUsage],
    subjectKeyId: status.subjectKeyId.slice(),
    authorityKeyId: status.authorityKeyId.slice(),
  };
}

/** Freeze plain objects and arrays recursively; errors and typed arrays are left as-is. */
function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Error || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}
