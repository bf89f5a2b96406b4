/**
 * Status bundles
 *
 * A bundle is a JSON document holding the objects an external fetcher collected for
 * one Certificate, plus the error message of every lookup that failed:
 *
 * ```json
 * {
 *   "certificate": { "metadata": { "name": "web" }, "spec": { ... }, "status": { ... } },
 *   "issuer": { "metadata": { "name": "ca" } },
 *   "secret": { "metadata": { "name": "web-tls" }, "data": { "tls.crt": "<base64>" } },
 *   "certificateRequest": { "metadata": { "name": "web-1" } },
 *   "certificateRequestEvents": { "items": [] },
 *   "errors": { "issuer": "issuers.cert-manager.io \"ca\" not found" }
 * }
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { ISSUER_KIND, type CertificateStatus } from '../types/status.js';
import { BundleValidationError, LookupFailedError } from '../errors/status-errors.js';
import { CertificateStatusBuilder } from './builder.js';
import { debugStatus } from '../utils/debug.js';

/** Absent and null both read as undefined */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);
}

const requiredString = z.string().min(1);
const optionalString = optional(z.string());

export const ObjectMetaSchema = z.object({
  name: requiredString,
  namespace: optionalString,
  creationTimestamp: optionalString,
});

export const ConditionSchema = z.object({
  type: requiredString,
  status: requiredString,
  reason: optionalString,
  message: optionalString,
  lastTransitionTime: optionalString,
});

export const CertificateSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: z.object({
    secretName: requiredString,
    commonName: optionalString,
    dnsNames: list(requiredString),
    issuerRef: z.object({
      name: requiredString,
      kind: optionalString,
      group: optionalString,
    }),
  }),
  status: optional(
    z.object({
      conditions: list(ConditionSchema),
      notBefore: optionalString,
      notAfter: optionalString,
      renewalTime: optionalString,
    }),
  ),
});

/** Shape shared by Issuer, ClusterIssuer and CertificateRequest */
export const ConditionedObjectSchema = z.object({
  metadata: ObjectMetaSchema,
  status: optional(z.object({ conditions: list(ConditionSchema) })),
});

export const SecretSchema = z.object({
  metadata: ObjectMetaSchema,
  data: optional(z.record(z.string(), z.string().nullish().transform((value) => value ?? ''))),
});

export const EventSchema = z.object({
  type: optionalString,
  reason: optionalString,
  message: optionalString,
  count: optional(z.number().finite()),
  firstTimestamp: optionalString,
  lastTimestamp: optionalString,
  eventTime: optionalString,
  reportingComponent: optionalString,
  source: optional(z.object({ component: optionalString, host: optionalString })),
});

export const EventListSchema = z.object({ items: list(EventSchema) });

export interface BundleErrors {
  issuer?: string;
  secret?: string;
  certificateRequest?: string;
}

export const StatusBundleSchema = z.object({
  certificate: CertificateSchema,
  issuer: optional(ConditionedObjectSchema),
  clusterIssuer: optional(ConditionedObjectSchema),
  secret: optional(SecretSchema),
  certificateRequest: optional(ConditionedObjectSchema),
  /** Events of the Certificate itself */
  events: optional(EventListSchema),
  certificateRequestEvents: optional(EventListSchema),
  errors: z
    .object({
      issuer: optionalString,
      secret: optionalString,
      certificateRequest: optionalString,
    })
    .nullish()
    .transform((errors): BundleErrors => errors ?? {}),
});

export type StatusBundle = z.infer<typeof StatusBundleSchema>;

/** `certificate.spec.dnsNames[0]`; the document root is `bundle` */
function issuePath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return 'bundle';
  }
  return path
    .map((segment, i) => {
      if (typeof segment === 'number') return `[${segment}]`;
      return i === 0 ? segment : `.${segment}`;
    })
    .join('');
}

function expectation(issue: ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return `${/^[aeiou]/.test(issue.expected) ? 'an' : 'a'} ${issue.expected}`;
    case 'too_small':
      return 'a non-empty string';
    default:
      return issue.message;
  }
}

/**
 * Validate an untyped bundle document.
 *
 * @throws BundleValidationError naming the first offending path
 */
export function parseStatusBundle(input: unknown): StatusBundle {
  const result = StatusBundleSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    if (!issue) {
      throw BundleValidationError.unreadable(result.error.message);
    }
    throw BundleValidationError.invalid(issuePath(issue.path), expectation(issue));
  }
  return result.data;
}

function lookupError(resource: string, message: string | undefined): Error | undefined {
  return message === undefined ? undefined : LookupFailedError.forResource(resource, message);
}

/**
 * Run a validated bundle through the status builder. The issuer lookup follows the
 * Certificate's issuer kind.
 */
export function buildStatusFromBundle(bundle: StatusBundle): CertificateStatus {
  const builder = CertificateStatusBuilder.fromCertificate(bundle.certificate).withEvents(
    bundle.events,
  );

  const issuerErr = lookupError('issuer', bundle.errors.issuer);
  if (builder.issuerKind === ISSUER_KIND.CLUSTER_ISSUER) {
    builder.withClusterIssuer(bundle.clusterIssuer, issuerErr);
  } else {
    builder.withIssuer(bundle.issuer, issuerErr);
  }

  debugStatus('building status for Certificate %s', bundle.certificate.metadata.name);
  return builder
    .withSecret(bundle.secret, lookupError('secret', bundle.errors.secret))
    .withCR(
      bundle.certificateRequest,
      bundle.certificateRequestEvents,
      lookupError('certificateRequest', bundle.errors.certificateRequest),
    )
    .build();
}

/**
 * Parse bundle JSON text and build the Certificate status it describes.
 */
export function loadStatusBundle(json: string): CertificateStatus {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (e) {
    throw BundleValidationError.unreadable(e instanceof Error ? e.message : String(e));
  }
  return buildStatusFromBundle(parseStatusBundle(document));
}
