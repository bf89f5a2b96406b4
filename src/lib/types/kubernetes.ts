/**
 * Kubernetes and cert-manager object shapes
 *
 * Structural types covering the fields read while collecting Certificate status.
 * Objects arrive already fetched (from a cluster client or a JSON bundle), so every
 * field the API server may omit is optional here.
 *
 * @see https://cert-manager.io/docs/reference/api-docs/
 */

/** Key of the Secret data entry holding the PEM encoded certificate chain */
export const TLS_CERT_KEY = 'tls.crt';

export interface ObjectMeta {
  name: string;
  namespace?: string;
  /** RFC 3339 timestamp */
  creationTimestamp?: string;
}

export type ConditionStatus = 'True' | 'False' | 'Unknown';

/**
 * Typed status tuple shared by Certificate, Issuer and CertificateRequest
 */
export interface Condition {
  type: string;
  status: ConditionStatus | string;
  reason?: string;
  message?: string;
  lastTransitionTime?: string;
}

export interface IssuerRef {
  name: string;
  kind?: string;
  group?: string;
}

export interface CertificateSpec {
  secretName: string;
  issuerRef: IssuerRef;
  commonName?: string;
  dnsNames?: string[];
}

export interface CertificateResourceStatus {
  conditions?: Condition[];
  notBefore?: string;
  notAfter?: string;
  renewalTime?: string;
}

export interface Certificate {
  kind?: 'Certificate';
  metadata: ObjectMeta;
  spec: CertificateSpec;
  status?: CertificateResourceStatus;
}

export interface IssuerResourceStatus {
  conditions?: Condition[];
}

export interface Issuer {
  kind?: 'Issuer';
  metadata: ObjectMeta;
  status?: IssuerResourceStatus;
}

export interface ClusterIssuer {
  kind?: 'ClusterIssuer';
  metadata: ObjectMeta;
  status?: IssuerResourceStatus;
}

export interface Secret {
  kind?: 'Secret';
  metadata: ObjectMeta;
  /** Base64 encoded values, as served by the API server */
  data?: Record<string, string>;
}

export interface CertificateRequest {
  kind?: 'CertificateRequest';
  metadata: ObjectMeta;
  status?: { conditions?: Condition[] };
}

export interface EventSource {
  component?: string;
  host?: string;
}

/** core/v1 Event, trimmed to what the event table shows */
export interface Event {
  type?: string;
  reason?: string;
  message?: string;
  count?: number;
  firstTimestamp?: string;
  lastTimestamp?: string;
  eventTime?: string;
  source?: EventSource;
  reportingComponent?: string;
}

export interface EventList {
  items: Event[];
}
