/**
 * AuthGate - JWT Signers
 *
 * RS256 signing backends. In production the private key never leaves
 * KMS; the local signer serves development and tests.
 *
 * @see https://docs.aws.amazon.com/kms/latest/APIReference/API_Sign.html
 */

import {
    GetPublicKeyCommand,
    KMSClient,
    SignCommand,
    SigningAlgorithmSpec,
} from '@aws-sdk/client-kms';
import { createPrivateKey, createPublicKey, createSign, generateKeyPairSync } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import type { SigningConfig } from '../config';

// =============================================================================
// Signer Port
// =============================================================================

export interface JwtSigner {
    /** JWT `kid`; must match the JWKS entry */
    readonly keyId: string;
    /** RSASSA-PKCS1-v1_5 SHA-256 signature over the signing input */
    sign(signingInput: Buffer): Promise<Buffer>;
    /** Public half of the signing key */
    getPublicKey(): Promise<KeyObject>;
}

// =============================================================================
// KMS Signer
// =============================================================================

export class KmsSigner implements JwtSigner {
    readonly keyId: string;
    private readonly kmsClient: KMSClient;
    private readonly kmsKeyId: string;
    private publicKey: Promise<KeyObject> | null = null;

    constructor(config: { keyId: string; kmsKeyId: string; region?: string }, kmsClient?: KMSClient) {
        this.keyId = config.keyId;
        this.kmsKeyId = config.kmsKeyId;
        this.kmsClient = kmsClient ?? new KMSClient({ region: config.region });
    }

    async sign(signingInput: Buffer): Promise<Buffer> {
        const result = await this.kmsClient.send(
            new SignCommand({
                KeyId: this.kmsKeyId,
                Message: signingInput,
                MessageType: 'RAW',
                SigningAlgorithm: SigningAlgorithmSpec.RSASSA_PKCS1_V1_5_SHA_256,
            })
        );

        if (!result.Signature) {
            throw new Error('KMS signing operation returned no signature');
        }
        return Buffer.from(result.Signature);
    }

    /**
     * Fetch the public key once per container. KeySpec and KeyUsage are
     * checked so a misconfigured key fails loudly instead of at verify time.
     */
    getPublicKey(): Promise<KeyObject> {
        if (!this.publicKey) {
            this.publicKey = this.fetchPublicKey().catch((err: unknown) => {
                this.publicKey = null;
                throw err;
            });
        }
        return this.publicKey;
    }

    private async fetchPublicKey(): Promise<KeyObject> {
        const response = await this.kmsClient.send(new GetPublicKeyCommand({ KeyId: this.kmsKeyId }));

        if (!response.PublicKey) {
            throw new Error('KMS GetPublicKey returned no public key');
        }
        if (response.KeySpec !== 'RSA_2048' && response.KeySpec !== 'RSA_4096') {
            throw new Error(`Unsupported KMS key spec: ${response.KeySpec}`);
        }
        if (response.KeyUsage !== 'SIGN_VERIFY') {
            throw new Error(`KMS key usage must be SIGN_VERIFY, got: ${response.KeyUsage}`);
        }

        return createPublicKey({
            key: Buffer.from(response.PublicKey),
            format: 'der',
            type: 'spki',
        });
    }
}

// =============================================================================
// Local Key Signer
// =============================================================================

export class LocalKeySigner implements JwtSigner {
    readonly keyId: string;
    private readonly privateKey: KeyObject;
    private readonly publicKey: KeyObject;

    constructor(keyId: string, privateKey: KeyObject) {
        if (privateKey.asymmetricKeyType !== 'rsa') {
            throw new Error('Signing key must be an RSA private key');
        }
        this.keyId = keyId;
        this.privateKey = privateKey;
        this.publicKey = createPublicKey(privateKey);
    }

    static fromPem(keyId: string, pem: string): LocalKeySigner {
        return new LocalKeySigner(keyId, createPrivateKey(pem));
    }

    /** Fresh 2048-bit key, for development and tests */
    static generate(keyId: string): LocalKeySigner {
        const { privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
        return new LocalKeySigner(keyId, privateKey);
    }

    async sign(signingInput: Buffer): Promise<Buffer> {
        return createSign('RSA-SHA256').update(signingInput).sign(this.privateKey);
    }

    async getPublicKey(): Promise<KeyObject> {
        return this.publicKey;
    }
}

// =============================================================================
// Factory
// =============================================================================

export function createSigner(config: SigningConfig, region?: string): JwtSigner {
    switch (config.kind) {
        case 'kms':
            return new KmsSigner({ keyId: config.keyId, kmsKeyId: config.kmsKeyId, region });
        case 'local':
            return LocalKeySigner.fromPem(config.keyId, config.privateKeyPem);
    }
}
