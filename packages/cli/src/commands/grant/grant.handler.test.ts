import { ReconcileError } from "@portwarden/core";
import {
  createMockContext,
  makeTarget,
  stubSingleGroupTopology,
  vmId,
  type MockContext,
} from "../../__tests__/helpers";
import type { IPublicIpService } from "../../interfaces";
import { GrantHandler } from "./grant.handler";

describe("GrantHandler", () => {
  let ctx: MockContext;
  let publicIp: jest.Mocked<IPublicIpService>;
  let handler: GrantHandler;

  beforeEach(() => {
    jest.clearAllMocks();
    ctx = createMockContext();
    publicIp = { detect: jest.fn() };
    handler = new GrantHandler(ctx, publicIp);

    stubSingleGroupTopology(ctx.provider, makeTarget());
    ctx.provider.listRules.mockResolvedValue([]);
    ctx.provider.createRule.mockImplementation(async (_group, _rg, rule) => rule);
  });

  it("should create an allow rule for the given address and exit 0", async () => {
    const code = await handler.execute({ resourceId: vmId("web01"), ip: "203.0.113.7" });

    expect(code).toBe(0);
    expect(publicIp.detect).not.toHaveBeenCalled();
    expect(ctx.provider.createRule).toHaveBeenCalledWith(
      "web01-nsg",
      "test-rg",
      expect.objectContaining({
        priority: 100,
        access: "Allow",
        sourceAddressPrefixes: ["203.0.113.7/32"],
        destinationPortRanges: ["22"],
      })
    );
    expect(ctx.output.info).toHaveBeenCalledWith("1 VM(s) succeeded, 0 failed");
  });

  it("should detect the public address when --ip is omitted", async () => {
    publicIp.detect.mockResolvedValue("198.51.100.20");

    await handler.execute({ resourceId: vmId("web01") });

    expect(ctx.output.info).toHaveBeenCalledWith("Source IP: 198.51.100.20");
    expect(ctx.output.stopSpinner).toHaveBeenCalled();
  });

  it("should reject an invalid --ip before touching the provider", async () => {
    await expect(handler.execute({ resourceId: vmId("web01"), ip: "not-an-ip" })).rejects.toThrow(
      "Invalid IPv4 address 'not-an-ip'"
    );
    expect(ctx.provider.getTarget).not.toHaveBeenCalled();
  });

  it("should reject a malformed resource ID", async () => {
    await expect(handler.execute({ resourceId: "web01", ip: "203.0.113.7" })).rejects.toBeInstanceOf(
      ReconcileError
    );
  });

  it("should exit 1 when a group fails", async () => {
    ctx.provider.createRule.mockRejectedValue(new Error("quota"));

    const code = await handler.execute({ resourceId: vmId("web01"), ip: "203.0.113.7" });

    expect(code).toBe(1);
    expect(ctx.output.error).toHaveBeenCalledWith("web01: 1 of 1 NSG(s) failed");
  });

  it("should run the connectivity test when requested", async () => {
    ctx.provider.getPowerState.mockResolvedValue("running");
    ctx.provider.getTargetPublicAddresses.mockResolvedValue(["20.1.2.3"]);
    ctx.probe.connect.mockResolvedValue({ success: true, latencyMs: 12 });

    const code = await handler.execute({ resourceId: vmId("web01"), ip: "203.0.113.7", test: true });

    expect(code).toBe(0);
    expect(ctx.probe.connect).toHaveBeenCalledWith("20.1.2.3", 22, 5);
  });

  it("should keep going after a target fails in a batch", async () => {
    ctx.provider.listTargets.mockResolvedValue([
      { id: vmId("broken"), name: "broken", resourceGroup: "test-rg" },
      { id: vmId("web01"), name: "web01", resourceGroup: "test-rg" },
    ]);
    ctx.provider.getTarget.mockImplementation(async (id) => {
      if (id === vmId("broken")) {
        throw new Error("VM not found");
      }
      return makeTarget();
    });

    const code = await handler.execute({ all: true, ip: "203.0.113.7" });

    expect(code).toBe(1);
    expect(ctx.provider.createRule).toHaveBeenCalledTimes(1);
    expect(ctx.output.error).toHaveBeenCalledWith("broken: VM not found");
    expect(ctx.output.info).toHaveBeenCalledWith("1 VM(s) succeeded, 1 failed");
  });
});
