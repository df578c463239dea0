import fs from "fs-extra";
import os from "os";
import path from "path";
import { ReconcileError } from "@portwarden/core";
import { loadConfig, readConfigFile } from "./cli-config";

describe("cli config", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "portwarden-config-"));
    configPath = path.join(dir, "config.json");
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("should treat a missing file as empty", async () => {
    await expect(readConfigFile(configPath)).resolves.toEqual({});
  });

  it("should use defaults with no file, flags or environment", async () => {
    await expect(loadConfig({}, {}, configPath)).resolves.toEqual({
      ports: { sshPort: 22, rdpPort: 3389 },
      verifier: { probeTimeoutSeconds: 5, startSettleMs: 10_000, startAttempts: 1 },
    });
  });

  it("should read the file and convert the settle delay to milliseconds", async () => {
    await fs.writeJson(configPath, { subscriptionId: "sub-file", sshPort: 2200, startSettleSeconds: 2.5 });

    const config = await loadConfig({}, {}, configPath);

    expect(config.subscriptionId).toBe("sub-file");
    expect(config.ports.sshPort).toBe(2200);
    expect(config.verifier.startSettleMs).toBe(2500);
  });

  it("should fill ports left unset with the defaults", async () => {
    await fs.writeJson(configPath, { rdpPort: 3390 });

    const config = await loadConfig({}, {}, configPath);

    expect(config.ports).toEqual({ sshPort: 22, rdpPort: 3390 });
  });

  it("should let flags beat the environment and the environment beat the file", async () => {
    await fs.writeJson(configPath, { subscriptionId: "sub-file", sshPort: 2200, rdpPort: 3390 });

    const config = await loadConfig(
      { sshPort: "2222" },
      { AZURE_SUBSCRIPTION_ID: "sub-env", PORTWARDEN_SSH_PORT: "2201", PORTWARDEN_RDP_PORT: "3391" },
      configPath
    );

    expect(config.subscriptionId).toBe("sub-env");
    expect(config.ports).toEqual({ sshPort: 2222, rdpPort: 3391 });
  });

  it("should reject an invalid port and name its source", async () => {
    await expect(loadConfig({ rdpPort: "99999" }, {}, configPath)).rejects.toThrow(
      "Invalid RDP port '99999' from --rdp-port. Must be an integer between 1 and 65535."
    );
  });

  it("should reject malformed JSON", async () => {
    await fs.writeFile(configPath, "{ not json");

    await expect(readConfigFile(configPath)).rejects.toThrow(`Invalid JSON in ${configPath}`);
  });

  it("should reject unknown keys", async () => {
    await fs.writeJson(configPath, { sshport: 22 });

    const error = await readConfigFile(configPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({ type: "INVALID_INPUT" });
  });
});
