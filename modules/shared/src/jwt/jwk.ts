/**
 * AuthGate - JSON Web Key Export
 *
 * @see RFC 7517 - JSON Web Key (JWK)
 * @see RFC 7518 Section 6.3 - Parameters for RSA Keys
 */

import type { KeyObject } from 'node:crypto';
import { JwtAlgorithm } from '../constants';

export interface RSAJsonWebKey {
    readonly kty: 'RSA';
    readonly use: 'sig';
    readonly alg: 'RS256';
    readonly kid: string;
    /** Modulus, base64url */
    readonly n: string;
    /** Exponent, base64url */
    readonly e: string;
}

export interface JWKS {
    readonly keys: readonly RSAJsonWebKey[];
}

export function toRsaJwk(publicKey: KeyObject, kid: string): RSAJsonWebKey {
    const jwk = publicKey.export({ format: 'jwk' });
    if (jwk.kty !== 'RSA' || typeof jwk.n !== 'string' || typeof jwk.e !== 'string') {
        throw new Error('Signing key is not an RSA key');
    }
    return {
        kty: 'RSA',
        use: 'sig',
        alg: JwtAlgorithm.RS256,
        kid,
        n: jwk.n,
        e: jwk.e,
    };
}
