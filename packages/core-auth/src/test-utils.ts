import * as jwt from "jsonwebtoken";

export interface TestTokenOptions {
  userId?: string;
  expiresIn?: string | number;
  issuer?: string;
  audience?: string;
  metadata?: Record<string, unknown>;
}

export function createTestToken(secret: string, options: TestTokenOptions = {}): string {
  if (!secret) {
    throw new Error("JWT secret is required to generate test tokens");
  }

  const payload: jwt.JwtPayload = {
    sub: options.userId ?? "test-user",
    ...options.metadata,
  };

  const signOptions: jwt.SignOptions = {
    algorithm: "HS256",
    expiresIn: (options.expiresIn ?? "1h") as jwt.SignOptions["expiresIn"],
  };
  if (options.issuer) signOptions.issuer = options.issuer;
  if (options.audience) signOptions.audience = options.audience;

  return jwt.sign(payload, secret, signOptions);
}

export const TEST_JWT_SECRET = "test-secret";
