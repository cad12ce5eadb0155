/**
 * JWT caller identity.
 *
 * Every state-changing call is attributed to the `sub` claim of a bearer token;
 * the games use that id as the wallet account of the caller and as entropy salt.
 * Owner privileges are not carried in the token: each game compares the caller
 * against its configured owner id.
 *
 * Environment:
 * - AUTH_JWT_ALGO: "HS256" | "RS256" (default "HS256")
 * - AUTH_JWT_SECRET: HS256 secret
 * - AUTH_JWT_PUBLIC_KEY: RS256 public key, PEM or base64-encoded PEM
 * - AUTH_JWT_ISSUER / AUTH_JWT_AUDIENCE: optional claims to enforce
 */

import {
  CanActivate,
  ExecutionContext,
  Global,
  Inject,
  Injectable,
  Module,
  UnauthorizedException,
  createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";
import * as jwt from "jsonwebtoken";
import { HouseErrorCode, houseErrorPayload } from "@wagerhouse/core-errors";
import { LOGGER } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";

export interface AuthContext {
  userId: string;
  metadata?: Record<string, unknown>;
}

export interface IAuthPort {
  verifyToken(token: string): Promise<AuthContext>;
}

export interface JwtAuthPortOptions {
  algorithm: "HS256" | "RS256";
  secret?: string;
  publicKey?: string;
  issuer?: string;
  audience?: string;
}

export const AUTH_PORT = Symbol("AUTH_PORT");
export const AUTH_CONTEXT_REQUEST_KEY = "authContext";

const RESERVED_CLAIMS = new Set(["sub", "iat", "exp", "nbf", "iss", "aud", "jti"]);

function decodeKey(raw: string): string {
  return raw.includes("-----BEGIN") ? raw : Buffer.from(raw, "base64").toString("utf-8");
}

export function jwtOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): JwtAuthPortOptions {
  const algorithm = (env.AUTH_JWT_ALGO ?? "HS256").toUpperCase();
  if (algorithm !== "HS256" && algorithm !== "RS256") {
    throw new Error(`Unsupported JWT algorithm: ${algorithm}. Supported: HS256, RS256`);
  }
  return {
    algorithm,
    secret: env.AUTH_JWT_SECRET,
    publicKey: env.AUTH_JWT_PUBLIC_KEY,
    issuer: env.AUTH_JWT_ISSUER,
    audience: env.AUTH_JWT_AUDIENCE,
  };
}

export class JwtAuthPort implements IAuthPort {
  private readonly key: string;

  constructor(private readonly options: JwtAuthPortOptions) {
    if (options.algorithm === "HS256") {
      if (!options.secret) {
        throw new Error("AUTH_JWT_SECRET is required for HS256");
      }
      this.key = options.secret;
    } else {
      if (!options.publicKey) {
        throw new Error("AUTH_JWT_PUBLIC_KEY is required for RS256");
      }
      this.key = decodeKey(options.publicKey);
    }
  }

  async verifyToken(token: string): Promise<AuthContext> {
    const cleanToken = token.replace(/^Bearer\s+/i, "");
    if (!cleanToken) {
      throw new UnauthorizedException(houseErrorPayload(HouseErrorCode.AUTH_FAILED, "Missing authorization token"));
    }

    const verifyOptions: jwt.VerifyOptions = { algorithms: [this.options.algorithm] };
    if (this.options.issuer) verifyOptions.issuer = this.options.issuer;
    if (this.options.audience) verifyOptions.audience = this.options.audience;

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(cleanToken, this.key, verifyOptions);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedException(houseErrorPayload(HouseErrorCode.TOKEN_EXPIRED, "Token has expired"));
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new UnauthorizedException(houseErrorPayload(HouseErrorCode.AUTH_FAILED, `Invalid token: ${reason}`));
    }

    if (typeof decoded === "string" || !decoded.sub) {
      throw new UnauthorizedException(houseErrorPayload(HouseErrorCode.AUTH_FAILED, "JWT missing required claim: sub"));
    }

    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(decoded)) {
      if (!RESERVED_CLAIMS.has(key)) {
        metadata[key] = value;
      }
    }

    return {
      userId: String(decoded.sub),
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    };
  }
}

type AuthenticatedRequest = Request & { [AUTH_CONTEXT_REQUEST_KEY]?: AuthContext };

/**
 * Attaches the caller's {@link AuthContext} to the request. `GET /health` and
 * `GET /metrics` stay public.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private static readonly PUBLIC_ROUTES = [
    { method: "GET", path: /^\/health$/ },
    { method: "GET", path: /^\/metrics$/ },
  ];

  constructor(
    @Inject(AUTH_PORT) private readonly authPort: IAuthPort,
    @Inject(LOGGER) private readonly logger: ILogger,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (AuthGuard.PUBLIC_ROUTES.some((route) => route.method === request.method && route.path.test(request.path))) {
      return true;
    }

    const header = request.headers["authorization"];
    const token = Array.isArray(header) ? header[0] : header;
    if (!token) {
      throw new UnauthorizedException(
        houseErrorPayload(HouseErrorCode.AUTH_FAILED, "Missing authorization token. Provide Authorization: Bearer <token> header."),
      );
    }

    try {
      request[AUTH_CONTEXT_REQUEST_KEY] = await this.authPort.verifyToken(token);
      return true;
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        throw error;
      }
      this.logger.error("auth.verify.error", { err: error instanceof Error ? error.message : String(error) });
      throw new UnauthorizedException(houseErrorPayload(HouseErrorCode.AUTH_FAILED, "Invalid or missing authentication token"));
    }
  }
}

export const Auth = createParamDecorator((_data: unknown, ctx: ExecutionContext): AuthContext => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  const authContext = request[AUTH_CONTEXT_REQUEST_KEY];
  if (!authContext) {
    throw new UnauthorizedException(
      houseErrorPayload(HouseErrorCode.AUTH_FAILED, "Auth context missing in request. Ensure AuthGuard is applied to this route."),
    );
  }
  return authContext;
});

@Global()
@Module({
  providers: [
    {
      provide: AUTH_PORT,
      useFactory: (): IAuthPort => new JwtAuthPort(jwtOptionsFromEnv()),
    },
    AuthGuard,
  ],
  exports: [AUTH_PORT, AuthGuard],
})
export class AuthModule {}

export * from "./test-utils";
