import { createTestToken, TEST_JWT_SECRET } from "../../packages/core-auth/src/test-utils";

/**
 * Signs a token the apps' AuthGuard accepts.
 *
 * @example
 * ```typescript
 * request(app.getHttpServer())
 *   .post("/wheel/spin")
 *   .set("Authorization", `Bearer ${createTestAuthToken({ userId: "alice" })}`)
 * ```
 */
export function createTestAuthToken(options: { userId?: string; expiresIn?: string | number } = {}): string {
  const secret = process.env.AUTH_JWT_SECRET || TEST_JWT_SECRET;
  return createTestToken(secret, options);
}
