import { describe, it, expect } from "@jest/globals";
import { readCredentials } from "@/services/LoginService";
import { FatalPreconditionError } from "@/core/errors/ScannerErrors";

describe("readCredentials", () => {
  it("환경변수에서 자격 증명을 읽어야 함", () => {
    expect(
      readCredentials({
        CATALOG_USERNAME: " buyer@example.com ",
        CATALOG_PASSWORD: "test-secret",
      }),
    ).toEqual({ username: "buyer@example.com", password: "test-secret" });
  });

  it("하나라도 없으면 FatalPreconditionError", () => {
    expect(() => readCredentials({ CATALOG_USERNAME: "buyer@example.com" })).toThrow(
      FatalPreconditionError,
    );
    expect(() => readCredentials({ CATALOG_PASSWORD: "test-secret" })).toThrow(
      "CATALOG_USERNAME",
    );
  });
});
