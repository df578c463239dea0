import { ZodError } from "zod";
import { buildPortConfig, validatePort, VerifierConfigSchema } from "./port-config";

describe("buildPortConfig", () => {
  it("should use defaults when nothing is overridden", () => {
    expect(buildPortConfig()).toEqual({ sshPort: 22, rdpPort: 3389 });
  });

  it("should coerce string overrides and treat blanks as unset", () => {
    expect(buildPortConfig({ sshPort: "2222", rdpPort: " " })).toEqual({ sshPort: 2222, rdpPort: 3389 });
  });

  it("should reject out-of-range ports", () => {
    expect(() => buildPortConfig({ rdpPort: 70000 })).toThrow(ZodError);
  });
});

describe("validatePort", () => {
  it("should accept integers in range", () => {
    expect(validatePort("22")).toBe(22);
    expect(validatePort(" 65535 ")).toBe(65535);
  });

  it("should reject everything else", () => {
    expect(validatePort("0")).toBeUndefined();
    expect(validatePort("65536")).toBeUndefined();
    expect(validatePort("22.5")).toBeUndefined();
    expect(validatePort("-1")).toBeUndefined();
    expect(validatePort("ssh")).toBeUndefined();
    expect(validatePort("")).toBeUndefined();
  });
});

describe("VerifierConfigSchema", () => {
  it("should fill defaults", () => {
    expect(VerifierConfigSchema.parse({})).toEqual({
      probeTimeoutSeconds: 5,
      startSettleMs: 10_000,
      startAttempts: 1,
    });
  });
});
