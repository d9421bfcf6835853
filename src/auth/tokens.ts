import jwt, { type JwtPayload } from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { InvalidTokenError, SigningError } from "../domain/errors.js";

// The only algorithm a token may carry. Anything else (none, RS256, HS512)
// is rejected before the signature is even looked at.
const ALGORITHM = "HS256";

export interface TokenClaims {
  userId: string;
  username: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenServiceOptions {
  secret: string;
  /** Default lifetime for issued tokens */
  ttlMs: number;
  now?: () => Date;
}

/**
 * Mints and checks HS256 JWTs. Stateless: validity depends only on the
 * signature and the iat/nbf/exp window, there is no revocation list.
 */
export class TokenService {
  private readonly secret: string;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  issueToken(userId: string, username: string, ttlMs: number = this.ttlMs): IssuedToken {
    if (!this.secret) throw new SigningError(new Error("signing secret is empty"));

    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const expiresAt = issuedAt + Math.max(0, Math.floor(ttlMs / 1000));

    try {
      const token = jwt.sign(
        {
          user_id: userId,
          username,
          iat: issuedAt,
          nbf: issuedAt,
          exp: expiresAt,
          jti: uuidv4(),
        },
        this.secret,
        { algorithm: ALGORITHM }
      );
      return { token, expiresAt: new Date(expiresAt * 1000) };
    } catch (err) {
      throw new SigningError(err);
    }
  }

  /** Returns the user id the token was issued to. */
  validateToken(token: string): string {
    return this.inspectToken(token).userId;
  }

  inspectToken(token: string): TokenClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch {
      throw new InvalidTokenError();
    }

    if (typeof payload === "string") throw new InvalidTokenError();
    const { user_id: userId, username, iat, exp } = payload;
    if (typeof userId !== "string" || !userId || typeof username !== "string") {
      throw new InvalidTokenError();
    }
    if (typeof iat !== "number" || typeof exp !== "number") throw new InvalidTokenError();

    return {
      userId,
      username,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }
}
