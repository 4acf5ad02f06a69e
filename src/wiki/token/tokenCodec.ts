import * as jose from 'jose';
import { z } from 'zod';
import { nowSeconds } from '../../shared/clock';
import { TokenInvalid } from '../../shared/errors';
import { TokenClaims, TokenPrincipal } from '../../shared/types';
import { resolve } from '../permissions';
import { authenticate, CredentialStore } from '../store/credentialStore';

const ALGORITHM = 'HS256';

const claimsSchema = z.object({
  sub: z.string().min(1),
  caps: z.object({
    canRead: z.boolean(),
    canCreate: z.boolean(),
    canUpdate: z.boolean(),
    canDelete: z.boolean(),
  }),
  iss: z.string(),
  iat: z.number().int(),
  exp: z.number().int().optional(),
});

export interface TokenCodecOptions {
  secret: string;
  issuer: string;
  /** 0 issues tokens without an `exp` claim */
  ttlSeconds?: number;
}

/**
 * Issues and verifies the self-contained API tokens. Capabilities are frozen
 * into the claims at issuance; verification never consults the credential
 * store, so a role change only affects tokens issued afterwards.
 */
export class TokenCodec {
  private readonly secret: Uint8Array;
  private readonly issuer: string;
  private readonly ttlSeconds: number;

  constructor(private readonly credentials: CredentialStore, options: TokenCodecOptions) {
    this.secret = new TextEncoder().encode(options.secret);
    this.issuer = options.issuer;
    this.ttlSeconds = options.ttlSeconds ?? 0;
  }

  /** Throws AuthenticationFailure on bad credentials, ResourceAcquisitionFailure if the store fails. */
  async issue(login: string, password: string): Promise<string> {
    const principal = await authenticate(this.credentials, login, password);
    return this.sign(principal.login, resolve(principal.roles));
  }

  async sign(subject: string, capabilities: TokenClaims['caps']): Promise<string> {
    const now = nowSeconds();
    const jwt = new jose.SignJWT({ caps: { ...capabilities } })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(subject)
      .setIssuer(this.issuer)
      .setIssuedAt(now);

    if (this.ttlSeconds > 0) {
      jwt.setExpirationTime(now + this.ttlSeconds);
    }
    return jwt.sign(this.secret);
  }

  /** Throws TokenInvalid for anything but a well-formed token signed with our secret. */
  async verify(token: string): Promise<TokenPrincipal> {
    const tokenParts = token.split('.');
    if (tokenParts.length !== 3) {
      throw new TokenInvalid('format');
    }

    // Reject alg=none and friends before handing the token to jose
    let header: unknown;
    try {
      header = JSON.parse(Buffer.from(tokenParts[0], 'base64url').toString('utf8'));
    } catch {
      throw new TokenInvalid('header');
    }
    if (typeof header !== 'object' || header === null || !('alg' in header) || header.alg !== ALGORITHM) {
      throw new TokenInvalid('algorithm');
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        issuer: this.issuer,
        algorithms: [ALGORITHM],
        currentDate: new Date(nowSeconds() * 1000),
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        throw new TokenInvalid('expired');
      }
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new TokenInvalid('signature');
      }
      if (error instanceof jose.errors.JWTClaimValidationFailed) {
        throw new TokenInvalid('claims');
      }
      throw new TokenInvalid('malformed');
    }

    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new TokenInvalid('claims');
    }

    return {
      subject: claims.data.sub,
      capabilities: claims.data.caps,
      issuedAt: claims.data.iat,
    };
  }
}
