import { UserRoleSchema } from "@schoolcore/db/schema";
import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import bcrypt from "bcrypt";
import { authMiddleware, requireRole, signToken } from "@/middleware/auth";
import { audit } from "@/lib/audit";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const authRouter = new Hono<AppEnv>();

const SALT_ROUNDS = 10;

const signupSchema = z.object({
  schoolName: z.string().trim().min(1),
  name: z.string().trim().min(1),
  email: z.email(),
  password: z.string().min(6),
});

const loginSchema = z.object({
  email: z.email(),
  password: z.string(),
});

const createUserSchema = z.object({
  name: z.string().trim().min(1),
  email: z.email(),
  password: z.string().min(6),
  role: UserRoleSchema.default("staff"),
});

authRouter.post(
  "/signup",
  zValidator("json", signupSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolName, name, email, password } = c.req.valid("json");

    const existingUser = await store.findUserByEmail(email);
    if (existingUser) {
      return c.json({ success: false, error: "Email already exists" }, 400);
    }

    const hashedPassword = await bcrypt.hash(password, SALT_ROUNDS);
    const { school, user } = await store.createSchoolWithAdmin(schoolName, {
      name,
      email,
      password: hashedPassword,
    });

    return c.json(
      {
        success: true,
        data: {
          id: user.id,
          name: user.name,
          email: user.email,
          role: user.role,
          school: { id: school.id, name: school.name },
        },
      },
      201
    );
  }
);

authRouter.post(
  "/login",
  zValidator("json", loginSchema, rejectInvalid),
  async (c) => {
    const { email, password } = c.req.valid("json");

    const user = await c.get("store").findUserByEmail(email);
    if (!user) {
      return c.json({ success: false, error: "Invalid email or password" }, 400);
    }

    const valid = await bcrypt.compare(password, user.password);
    if (!valid) {
      return c.json({ success: false, error: "Invalid email or password" }, 400);
    }

    const token = signToken({
      userId: user.id,
      schoolId: user.schoolId,
      role: user.role,
    });

    return c.json({ success: true, data: { token } }, 200);
  }
);

authRouter.post(
  "/users",
  authMiddleware,
  requireRole("admin"),
  zValidator("json", createUserSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { name, email, password, role } = c.req.valid("json");

    if (await store.findUserByEmail(email)) {
      return c.json({ success: false, error: "Email already exists" }, 400);
    }

    const user = await store.createUser({
      schoolId,
      name,
      email,
      role,
      password: await bcrypt.hash(password, SALT_ROUNDS),
    });

    await audit(c, {
      action: "create",
      modelName: "User",
      objectId: user.id,
      objectDisplay: `${user.name} (${user.role})`,
      changes: {
        email: { old: null, new: user.email },
        role: { old: null, new: user.role },
      },
    });

    return c.json(
      {
        success: true,
        data: { id: user.id, name: user.name, email: user.email, role: user.role },
      },
      201
    );
  }
);
