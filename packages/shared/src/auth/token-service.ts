import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import { CredentialError, type TokenService } from '@gatehouse/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtl: string;
  issuer?: string;
}

/**
 * HS256 access tokens carrying the user (`sub`) and the server-side session
 * (`sid`). Keys rotate by `kid`: new tokens use the active key, and tokens
 * signed with any configured key still verify.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtl: string;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtl = config.accessTokenTtl;
    this.issuer = config.issuer ?? 'gatehouse';
  }

  async signAccessToken(userId: string, sessionId: string): Promise<string> {
    return new SignJWT({ sid: sessionId })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(userId)
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(`${this.accessTokenTtl}s`)
      .sign(this.activeKey.secret);
  }

  async verifyAccessToken(token: string): Promise<{ userId: string; sessionId: string }> {
    const { sub, sid } = await this.verify(token);
    if (!sub || typeof sid !== 'string' || sid.length === 0) {
      throw new CredentialError('invalid', 'Token is missing sub or sid claim');
    }
    return { userId: sub, sessionId: sid };
  }

  private async verify(token: string): Promise<JWTPayload> {
    try {
      const { payload } = await jwtVerify(
        token,
        (header) => {
          const key = header.kid ? this.keys.get(header.kid) : undefined;
          if (!key) throw new CredentialError('invalid', 'Unknown signing key');
          return key.secret;
        },
        {
          issuer: this.issuer,
          algorithms: ['HS256'],
        },
      );
      return payload;
    } catch (err) {
      if (err instanceof CredentialError) throw err;
      if (err instanceof errors.JWTExpired) {
        throw new CredentialError('expired', 'Token has expired');
      }
      throw new CredentialError('invalid', 'Token verification failed');
    }
  }
}
