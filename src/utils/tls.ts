/**
 * Certificate-validation error detection for outbound HTTPS calls
 */

// OpenSSL / Node TLS verification failure codes
const CERTIFICATE_ERROR_CODES = new Set([
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'CERT_SIGNATURE_FAILURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const CERTIFICATE_ERROR_PATTERNS = [
  'certificate',
  'self signed',
  'self-signed',
  'unable to verify the first certificate',
];

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check if an error is a TLS certificate-validation failure
 * (as opposed to a timeout, DNS error, refused connection or HTTP error)
 */
export function isCertificateError(error: unknown): boolean {
  const code = readCode(error);
  if (code && CERTIFICATE_ERROR_CODES.has(code)) {
    return true;
  }

  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('cause' in error && error.cause !== undefined && error.cause !== error && isCertificateError(error.cause)) {
    return true;
  }

  const errorMessage = 'message' in error && typeof error.message === 'string' ? error.message.toLowerCase() : '';
  return CERTIFICATE_ERROR_PATTERNS.some((pattern) => errorMessage.includes(pattern));
}
