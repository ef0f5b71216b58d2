import type { Context, Next } from "hono";
import jwt from "jsonwebtoken";
import { env } from "@schoolcore/env/server";
import { UserRoleSchema, type UserRole } from "@schoolcore/db/schema";
import { z } from "zod";

export const JWTPayloadSchema = z.object({
  userId: z.uuid(),
  schoolId: z.uuid(),
  role: UserRoleSchema,
});

export type JWTPayload = z.infer<typeof JWTPayloadSchema>;

export function signToken(payload: JWTPayload): string {
  return jwt.sign(payload, env.JWT_SECRET, { expiresIn: "7d" });
}

function readToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  return header.startsWith("Bearer ") ? header.slice("Bearer ".length) : header;
}

export const authMiddleware = async (c: Context, next: Next) => {
  const token = readToken(c.req.header("Authorization"));

  if (!token) {
    return c.json(
      { success: false, error: "Unauthorized, token missing or invalid" },
      401
    );
  }

  let decoded: JWTPayload;
  try {
    decoded = JWTPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET));
  } catch {
    return c.json(
      { success: false, error: "Unauthorized, token missing or invalid" },
      401
    );
  }

  c.set("user", decoded);
  await next();
};

export const requireRole = (...roles: UserRole[]) => {
  return async (c: Context, next: Next) => {
    const user = JWTPayloadSchema.safeParse(c.get("user"));
    if (!user.success || !roles.includes(user.data.role)) {
      return c.json(
        { success: false, error: `Forbidden, ${roles.join(" or ")} access required` },
        403
      );
    }
    await next();
  };
};
