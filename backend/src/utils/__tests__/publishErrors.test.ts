import { ChannelCredentialError, classifyPublishError, describePublishError } from "../publishErrors";

function httpError(status: number, data: unknown = {}) {
  return Object.assign(new Error(`Request failed with status code ${status}`), { response: { status, data } });
}

describe("classifyPublishError", () => {
  it("should treat credential errors and 401/403 as CredentialError", () => {
    expect(classifyPublishError(new ChannelCredentialError("token file missing"))).toBe("CredentialError");
    expect(classifyPublishError(httpError(401))).toBe("CredentialError");
    expect(classifyPublishError(httpError(403))).toBe("CredentialError");
  });

  it("should treat a revoked refresh token as CredentialError", () => {
    expect(classifyPublishError(new Error("invalid_grant: Token has been expired or revoked."))).toBe(
      "CredentialError"
    );
  });

  it("should treat other HTTP statuses as UploadError", () => {
    expect(classifyPublishError(httpError(500))).toBe("UploadError");
    expect(classifyPublishError(httpError(400))).toBe("UploadError");
  });

  it("should treat socket failures as NetworkError", () => {
    expect(classifyPublishError(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }))).toBe(
      "NetworkError"
    );
  });

  it("should classify non-Error values as Unknown", () => {
    expect(classifyPublishError("boom")).toBe("Unknown");
  });
});

describe("describePublishError", () => {
  it("should prefer the API message from the response body", () => {
    expect(describePublishError(httpError(400, { message: "Account not connected" }))).toBe("Account not connected");
    expect(describePublishError(httpError(403, { error: { message: "quotaExceeded" } }))).toBe("quotaExceeded");
  });

  it("should fall back to the error message", () => {
    expect(describePublishError(httpError(502))).toBe("Request failed with status code 502");
  });
});
