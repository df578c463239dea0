import {
  createMockContext,
  makeTarget,
  stubSingleGroupTopology,
  vmId,
  type MockContext,
} from "../../__tests__/helpers";
import { CONFIRMATION_WORD, RemoveRulesHandler } from "./remove-rules.handler";

const customRule = (name: string, priority: number) => ({
  name,
  priority,
  direction: "Inbound" as const,
  access: "Allow" as const,
  protocol: "Tcp",
  sourceAddressPrefixes: ["*"],
  sourcePortRanges: ["*"],
  destinationAddressPrefixes: ["*"],
  destinationPortRanges: ["22"],
});

describe("RemoveRulesHandler", () => {
  let ctx: MockContext;
  let handler: RemoveRulesHandler;

  beforeEach(() => {
    jest.clearAllMocks();
    ctx = createMockContext();
    handler = new RemoveRulesHandler(ctx);

    stubSingleGroupTopology(ctx.provider, makeTarget());
    ctx.provider.listRules.mockResolvedValue([customRule("a", 100), customRule("b", 110)]);
    ctx.provider.deleteRule.mockResolvedValue(undefined);
  });

  it("should require the typed confirmation word", async () => {
    ctx.prompt.askTypedConfirmation.mockResolvedValue(false);

    const code = await handler.execute({ resourceId: vmId("web01") });

    expect(code).toBe(1);
    expect(ctx.prompt.askTypedConfirmation).toHaveBeenCalledWith("This cannot be undone.", CONFIRMATION_WORD);
    expect(ctx.provider.deleteRule).not.toHaveBeenCalled();
    expect(ctx.output.info).toHaveBeenCalledWith("Aborted. No rules were removed.");
  });

  it("should delete every custom rule once confirmed", async () => {
    ctx.prompt.askTypedConfirmation.mockResolvedValue(true);

    const code = await handler.execute({ resourceId: vmId("web01") });

    expect(code).toBe(0);
    expect(ctx.provider.deleteRule).toHaveBeenCalledWith("web01-nsg", "test-rg", "a");
    expect(ctx.provider.deleteRule).toHaveBeenCalledWith("web01-nsg", "test-rg", "b");
    expect(ctx.output.dim).toHaveBeenCalledWith("Rules deleted: 2");
  });

  it("should skip the prompt with --yes", async () => {
    await handler.execute({ resourceId: vmId("web01"), yes: true });

    expect(ctx.prompt.askTypedConfirmation).not.toHaveBeenCalled();
    expect(ctx.provider.deleteRule).toHaveBeenCalledTimes(2);
  });

  it("should report partial failures and exit 1", async () => {
    ctx.provider.deleteRule.mockRejectedValueOnce(new Error("locked")).mockResolvedValueOnce(undefined);

    const code = await handler.execute({ resourceId: vmId("web01"), yes: true });

    expect(code).toBe(1);
    expect(ctx.output.dim).toHaveBeenCalledWith("Rules deleted: 1");
    expect(ctx.output.error).toHaveBeenCalledWith("web01: 1 rule(s) could not be deleted");
  });
});
