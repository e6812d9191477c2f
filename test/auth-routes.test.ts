import request from "supertest";
import { describe, expect, it } from "vitest";
import { AUTHOR, INACTIVE_USER, asUser, createTestApp } from "./helpers";

const fixedNow = () => new Date("2026-05-06T07:08:09.000Z");

describe("POST /api/auth/register", () => {
  it("creates a user and returns the summary", async () => {
    const { app, users } = createTestApp();

    const response = await request(app).post("/api/auth/register").send({
      email: "New.Writer@Example.com",
      username: "new_writer",
      password: "Str0ng!pass",
      first_name: "New",
      last_name: "Writer"
    });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      success: true,
      data: {
        user: { id: 5, email: "new.writer@example.com", username: "new_writer", full_name: "New Writer" },
        message: "User registered successfully"
      },
      status_code: 201
    });

    const stored = await users.findByEmail("new.writer@example.com");
    expect(stored?.passwordHash).toBe("hashed:Str0ng!pass");
    expect(stored?.isStaff).toBe(false);
  });

  it("rejects a duplicate email with the generic registration message", async () => {
    const { app } = createTestApp({ now: fixedNow });

    const response = await request(app).post("/api/auth/register").send({
      email: AUTHOR.email,
      username: "someone_else",
      password: "Str0ng!pass"
    });

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      error_id: expect.stringMatching(/^error_20260506_[0-9a-f]{8}$/),
      message: "Registration failed. Please check your input.",
      severity: "medium",
      timestamp: "2026-05-06T07:08:09Z",
      type: "ValidationError"
    });
  });

  it("rejects a duplicate username", async () => {
    const { app } = createTestApp();

    const response = await request(app).post("/api/auth/register").send({
      email: "fresh@example.com",
      username: AUTHOR.username,
      password: "Str0ng!pass"
    });

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe("Registration failed. Please check your input.");
  });

  it("treats a malformed payload as a security error and logs only field names", async () => {
    const { app, logger } = createTestApp();

    const response = await request(app).post("/api/auth/register").send({
      email: "fresh@example.com",
      username: "fresh_user",
      password: "weakpassword"
    });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({
      message: "Invalid input data",
      severity: "high",
      type: "SecurityException"
    });

    const logged = logger.entries.at(-1);
    expect(logged?.level).toBe("error");
    expect(JSON.stringify(logged?.metadata)).not.toContain("weakpassword");
  });
});

describe("POST /api/auth/login", () => {
  it("authenticates and records the login time", async () => {
    const { app, users } = createTestApp({ now: fixedNow });

    const response = await request(app)
      .post("/api/auth/login")
      .send({ email: "AUTHOR@example.com", password: "Author-Pass1!" });

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({
      user: {
        id: 1,
        email: "author@example.com",
        username: "author_one",
        full_name: "Ada Writer",
        is_staff: false,
        is_superuser: false
      },
      message: "Authentication successful"
    });
    expect((await users.findById(1))?.lastLogin).toBe("2026-05-06T07:08:09.000Z");
  });

  it("answers a wrong password with the generic credentials message", async () => {
    const { app } = createTestApp();

    const response = await request(app)
      .post("/api/auth/login")
      .send({ email: AUTHOR.email, password: "Wr0ng!pass" });

    expect(response.status).toBe(401);
    expect(response.body.error).toMatchObject({
      message: "Authentication failed. Please check your credentials.",
      severity: "medium",
      type: "AuthenticationError"
    });
  });

  it("refuses deactivated accounts", async () => {
    const { app, logger } = createTestApp();

    const response = await request(app)
      .post("/api/auth/login")
      .send({ email: INACTIVE_USER.email, password: "Gone-Pass1!" });

    expect(response.status).toBe(401);
    expect(response.body.error.message).toBe("Authentication failed. Please check your credentials.");
    expect(logger.entries.at(-1)?.metadata.error_message).toBe("Account is deactivated");
  });

  it("refuses unknown emails", async () => {
    const { app } = createTestApp();

    const response = await request(app)
      .post("/api/auth/login")
      .send({ email: "nobody@example.com", password: "Str0ng!pass" });

    expect(response.status).toBe(401);
  });
});

describe("POST /api/auth/password", () => {
  it("changes the password when the current one matches", async () => {
    const { app, users } = createTestApp();

    const response = await asUser(request(app).post("/api/auth/password"), AUTHOR.id).send({
      current_password: "Author-Pass1!",
      new_password: "N3w!password"
    });

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({ message: "Password changed successfully" });
    expect((await users.findById(AUTHOR.id))?.passwordHash).toBe("hashed:N3w!password");
  });

  it("rejects a wrong current password", async () => {
    const { app } = createTestApp();

    const response = await asUser(request(app).post("/api/auth/password"), AUTHOR.id).send({
      current_password: "Wr0ng!pass",
      new_password: "N3w!password"
    });

    expect(response.status).toBe(401);
    expect(response.body.error.message).toBe("Current password is incorrect");
  });

  it("rejects a weak new password", async () => {
    const { app } = createTestApp();

    const response = await asUser(request(app).post("/api/auth/password"), AUTHOR.id).send({
      current_password: "Author-Pass1!",
      new_password: "weak"
    });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({
      message: "New password doesn't meet requirements",
      type: "ValidationError"
    });
  });

  it("rejects an identity that no longer exists", async () => {
    const { app } = createTestApp();

    const response = await asUser(request(app).post("/api/auth/password"), 99).send({
      current_password: "Author-Pass1!",
      new_password: "N3w!password"
    });

    expect(response.status).toBe(401);
    expect(response.body.error.message).toBe("Authentication required");
  });
});
