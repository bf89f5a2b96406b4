/**
 * certlens library - core exports
 */

// Status collection
export { CertificateStatusBuilder } from './status/builder.js';
export {
  renderCRStatus,
  renderConditions,
  renderIssuerStatus,
  renderSecretStatus,
  type EventDescriber,
} from './status/render.js';
export { renderCertificateStatus } from './status/report.js';
export {
  KubectlEventDescriber,
  shortHumanDuration,
  type KubectlEventDescriberOptions,
} from './status/events.js';
export {
  CertificateSchema,
  ConditionSchema,
  ConditionedObjectSchema,
  EventListSchema,
  EventSchema,
  ObjectMetaSchema,
  SecretSchema,
  StatusBundleSchema,
  buildStatusFromBundle,
  loadStatusBundle,
  parseStatusBundle,
  type BundleErrors,
  type StatusBundle,
} from './status/bundle.js';

// Usage decoders
export {
  EXT_KEY_USAGE_LABELS,
  EXT_KEY_USAGE_OIDS,
  KEY_USAGE_LABELS,
  extKeyUsageFromOid,
  extKeyUsageToLabels,
  keyUsageToLabels,
  keyUsageToString,
  type UsageResult,
} from './status/usages.js';

// Certificate decoding
export {
  bytesToSignedBigInt,
  decodeX509CertificateBytes,
  publicKeyAlgorithmName,
  serialNumberToHex,
  signatureAlgorithmName,
  type ParsedCertificate,
} from './crypto/certificate.js';

// Error handling
export {
  BundleValidationError,
  CertificateDecodeError,
  CertificateParseError,
  LookupFailedError,
  SecretDataMissingError,
  StatusOperationError,
  UnknownExtKeyUsageError,
  isBundleValidationError,
  isStatusOperationError,
  type StatusOperationErrorType,
} from './errors/status-errors.js';

// Types
export * from './types/kubernetes.js';
export * from './types/status.js';
