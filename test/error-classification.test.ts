import { describe, expect, it } from "vitest";
import {
  AuthenticationError,
  AuthorizationError,
  BusinessLogicError,
  DatabaseError,
  SecurityException,
  SlugConflictError,
  ValidationError
} from "../src/cms/errors";
import { classifyError, outwardMessage } from "../src/cms/http";

describe("classifyError", () => {
  it.each([
    [new ValidationError("x"), 400, "medium"],
    [new AuthenticationError("x"), 401, "medium"],
    [new AuthorizationError("x"), 403, "medium"],
    [new BusinessLogicError("x"), 422, "medium"],
    [new SecurityException("x"), 400, "high"],
    [new DatabaseError("x"), 500, "high"],
    [new SlugConflictError("article", "taken"), 500, "high"],
    [new TypeError("x"), 500, "high"],
    ["not an error", 500, "high"]
  ])("maps %s to %i/%s", (error, status, severity) => {
    expect(classifyError(error)).toEqual({ status, severity });
  });
});

describe("outwardMessage", () => {
  it("uses the user message of a client error when present", () => {
    const error = new ValidationError("Email address already exists", {
      userMessage: "Registration failed. Please check your input."
    });

    expect(outwardMessage(error, classifyError(error))).toBe("Registration failed. Please check your input.");
  });

  it("falls back to the service-authored message of a client error", () => {
    const error = new BusinessLogicError("Article not found");

    expect(outwardMessage(error, classifyError(error))).toBe("Article not found");
  });

  it("never exposes the message of a server error", () => {
    const error = new DatabaseError("relation \"articles\" does not exist");

    expect(outwardMessage(error, classifyError(error))).toBeUndefined();
  });
});
