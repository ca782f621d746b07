export { KmsSigner, LocalKeySigner, createSigner } from './signer';
export type { JwtSigner } from './signer';
export { signJwt, verifyJwt, stringClaim, numberClaim, stringArrayClaim } from './jwt';
export type { JwtClaims, VerifyOptions } from './jwt';
export { toRsaJwk } from './jwk';
export type { RSAJsonWebKey, JWKS } from './jwk';
