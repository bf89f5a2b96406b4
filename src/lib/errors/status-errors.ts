/**
 * Status collection errors
 *
 * Typed errors raised while collecting and rendering Certificate status. The builder
 * never lets them escape: they are stored on the failed sub-report and their message
 * is printed in place of the section they belong to.
 */

/**
 * Base class for all status collection errors
 */
export abstract class StatusOperationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The Secret exists but holds no certificate under the expected key
 */
export class SecretDataMissingError extends StatusOperationError {
  readonly code = 'SECRET_DATA_MISSING';
  readonly type = 'secret';

  static forSecret(secretName: string, key: string): SecretDataMissingError {
    return new SecretDataMissingError(
      `error: '${key}' of Secret ${JSON.stringify(secretName)} is not set`,
      { secretName, key },
    );
  }
}

/**
 * The Secret holds bytes under the expected key that are not a certificate
 */
export class CertificateParseError extends StatusOperationError {
  readonly code = 'CERTIFICATE_PARSE_ERROR';
  readonly type = 'secret';

  static forSecret(secretName: string, key: string, cause: unknown): CertificateParseError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new CertificateParseError(
      `error when parsing '${key}' of Secret ${JSON.stringify(secretName)}: ${reason}`,
      { secretName, key, reason },
    );
  }
}

/**
 * Raw bytes could not be decoded as an X.509 certificate
 */
export class CertificateDecodeError extends StatusOperationError {
  readonly code = 'CERTIFICATE_DECODE_ERROR';
  readonly type = 'crypto';

  static empty(): CertificateDecodeError {
    return new CertificateDecodeError('error decoding certificate: no data');
  }

  static invalidBase64(): CertificateDecodeError {
    return new CertificateDecodeError('illegal base64 data');
  }

  static noPemBlock(): CertificateDecodeError {
    return new CertificateDecodeError('error decoding certificate PEM block');
  }

  static invalid(reason: string): CertificateDecodeError {
    return new CertificateDecodeError(`error decoding X.509 certificate: ${reason}`, { reason });
  }
}

export class UnknownExtKeyUsageError extends StatusOperationError {
  readonly code = 'UNKNOWN_EXT_KEY_USAGE';
  readonly type = 'usage';

  static forCode(usageCode: number): UnknownExtKeyUsageError {
    return new UnknownExtKeyUsageError(
      `error when converting Extended Usages to string: encountered unknown Extended Usage with code ${usageCode}`,
      { usageCode },
    );
  }
}

/**
 * A resource lookup failed upstream (reported through a status bundle)
 */
export class LookupFailedError extends StatusOperationError {
  readonly code = 'LOOKUP_FAILED';
  readonly type = 'lookup';

  static forResource(resource: string, message: string): LookupFailedError {
    return new LookupFailedError(message, { resource });
  }
}

export class BundleValidationError extends StatusOperationError {
  readonly code = 'BUNDLE_INVALID';
  readonly type = 'bundle';

  static invalid(path: string, expected: string): BundleValidationError {
    return new BundleValidationError(`Invalid status bundle: ${path} must be ${expected}`, {
      path,
      expected,
    });
  }

  static unreadable(reason: string): BundleValidationError {
    return new BundleValidationError(`Invalid status bundle: ${reason}`, { reason });
  }
}

/**
 * Union type for all status collection errors
 */
export type StatusOperationErrorType =
  | SecretDataMissingError
  | CertificateParseError
  | CertificateDecodeError
  | UnknownExtKeyUsageError
  | LookupFailedError
  | BundleValidationError;

export function isStatusOperationError(error: unknown): error is StatusOperationErrorType {
  return error instanceof StatusOperationError;
}

export function isBundleValidationError(error: unknown): error is BundleValidationError {
  return error instanceof BundleValidationError;
}
