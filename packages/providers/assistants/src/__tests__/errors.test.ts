import { describe, test, expect } from "vitest";
import { classifyError, classifyStatus } from "../errors";

describe("classifyError", () => {
  test("returns 'transient_network' for connection failures", () => {
    expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:8080"))).toBe("transient_network");
    expect(classifyError(new Error("read ECONNRESET"))).toBe("transient_network");
    expect(classifyError(new Error("getaddrinfo ENOTFOUND api.example.test"))).toBe("transient_network");
  });

  test("looks at the cause of a fetch TypeError", () => {
    const err = new TypeError("request to upstream", { cause: new Error("connect ETIMEDOUT") });
    expect(classifyError(err)).toBe("transient_network");
  });

  test("returns 'unknown' for anything else", () => {
    expect(classifyError(new Error("something odd"))).toBe("unknown");
    expect(classifyError("not an error")).toBe("unknown");
  });
});

describe("classifyStatus", () => {
  test("maps HTTP statuses", () => {
    expect(classifyStatus(401)).toBe("auth_failed");
    expect(classifyStatus(403)).toBe("auth_failed");
    expect(classifyStatus(404)).toBe("not_found");
    expect(classifyStatus(429)).toBe("throttled");
    expect(classifyStatus(400)).toBe("invalid_request");
    expect(classifyStatus(500)).toBe("server_error");
    expect(classifyStatus(502)).toBe("server_error");
    expect(classifyStatus(418)).toBe("unknown");
  });
});
