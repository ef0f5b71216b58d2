import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "@/app";
import { MemoryStore } from "../helpers/memory-store";
import { TODAY, authHeader, jsonRequest, seedSchool } from "../helpers/fixtures";

const loginResponse = z.object({ data: z.object({ token: z.string() }) });

function freshApp() {
  const store = new MemoryStore();
  const app = createApp({
    store,
    today: () => TODAY,
    periodsPerDay: 6,
    corsOrigin: "http://localhost:5173",
    logRequests: false,
  });
  return { app, store };
}

function post(path: string, body: unknown) {
  return {
    path,
    init: {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    },
  };
}

describe("auth", () => {
  it("signs up a school admin and logs in", async () => {
    const { app, store } = freshApp();
    const signup = post("/auth/signup", {
      schoolName: "Hillside",
      name: "Meera",
      email: "meera@example.com",
      password: "password1",
    });

    const created = await app.request(signup.path, signup.init);
    expect(created.status).toBe(201);
    expect(store.users[0]?.password).not.toBe("password1");

    const login = post("/auth/login", { email: "meera@example.com", password: "password1" });
    const res = await app.request(login.path, login.init);
    expect(res.status).toBe(200);
    const { data } = loginResponse.parse(await res.json());
    const decoded = jwt.decode(data.token);
    expect(decoded).toMatchObject({ schoolId: store.schools[0]?.id, role: "admin" });
  });

  it("rejects a duplicate email and a wrong password", async () => {
    const { app, store } = freshApp();
    const signup = post("/auth/signup", {
      schoolName: "Hillside",
      name: "Meera",
      email: "meera@example.com",
      password: "password1",
    });
    await app.request(signup.path, signup.init);

    const again = await app.request(signup.path, signup.init);
    expect(await again.json()).toEqual({ success: false, error: "Email already exists" });
    expect(store.schools).toHaveLength(1);

    const login = post("/auth/login", { email: "meera@example.com", password: "wrong-one" });
    const res = await app.request(login.path, login.init);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: "Invalid email or password" });
  });

  it("answers a signup that loses the race for an email with a conflict", async () => {
    const { app, store } = freshApp();
    const signup = post("/auth/signup", {
      schoolName: "Hillside",
      name: "Meera",
      email: "meera@example.com",
      password: "password1",
    });
    await app.request(signup.path, signup.init);
    // the pre-check ran before the first signup committed
    store.findUserByEmail = async () => undefined;

    const res = await app.request(signup.path, signup.init);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      success: false,
      error: "Email already exists",
      code: "CONFLICT",
    });
    expect(store.schools).toHaveLength(1);
  });

  it("rejects missing and forged tokens", async () => {
    const { app } = seedSchool();

    expect((await app.request("/years")).status).toBe(401);
    expect((await app.request("/years", authHeader("not-a-jwt"))).status).toBe(401);
  });

  it("keeps admin routes from staff", async () => {
    const { app, staffToken } = seedSchool();

    const res = await app.request(
      "/years",
      jsonRequest(staffToken, { label: "2026-2027", startDate: "2026-06-01" })
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      success: false,
      error: "Forbidden, admin access required",
    });
  });
});
