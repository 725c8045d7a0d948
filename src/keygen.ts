/**
 * Credential key generation
 *
 * The login client encrypts username/password with a per-session RSA key
 * whose modulus it receives (scrambled) in the Init packet.
 */

import { webcrypto } from 'node:crypto';
import { fromBase64Url } from './utils/binary.ts';

/** Key size used for credential encryption */
export const CREDENTIALS_KEY_BITS = 1024;

/**
 * RSA key pair, all components big-endian without sign byte
 */
export interface CredentialKeyPair {
  bits: number;
  /** Public modulus, exactly `bits / 8` bytes */
  modulus: Uint8Array;
  publicExponent: Uint8Array;
  privateExponent: Uint8Array;
}

/**
 * Produces credential key pairs
 */
export interface KeypairGenerator {
  generate(): Promise<CredentialKeyPair>;
}

/**
 * Generate an RSA key pair using Web Crypto
 */
export async function generateCredentialKeys(
  bits: number = CREDENTIALS_KEY_BITS,
): Promise<CredentialKeyPair> {
  if (bits % 8 !== 0) {
    throw new Error(`RSA key size must be a multiple of 8, got ${bits}`);
  }

  const keyPair = await webcrypto.subtle.generateKey(
    {
      name: 'RSA-OAEP',
      modulusLength: bits,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]), // 65537
      hash: 'SHA-1',
    },
    true,
    ['encrypt', 'decrypt'],
  );

  const jwk = await webcrypto.subtle.exportKey('jwk', keyPair.privateKey);
  if (!jwk.n || !jwk.e || !jwk.d) {
    throw new Error('Exported RSA key is missing components');
  }

  const modulus = fromBase64Url(jwk.n);
  if (modulus.length !== bits / 8) {
    throw new Error(`Invalid modulus length (${modulus.length}), expected ${bits / 8}`);
  }

  return {
    bits,
    modulus,
    publicExponent: fromBase64Url(jwk.e),
    privateExponent: fromBase64Url(jwk.d),
  };
}

/** Default {@link KeypairGenerator} producing 1024-bit keys */
export const rsaKeypairGenerator: KeypairGenerator = {
  generate: () => generateCredentialKeys(),
};
