import type { FetchLike } from "./public-ip.service";
import { PublicIpService } from "./public-ip.service";

const SERVICES = ["https://first.test", "https://second.test"];

function response(body: string, status = 200) {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

function mockFetch() {
  return jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
}

describe("PublicIpService", () => {
  it("should return the first valid address", async () => {
    const fetchFn = mockFetch().mockResolvedValue(response("203.0.113.7\n"));
    const service = new PublicIpService(fetchFn, undefined, SERVICES);

    await expect(service.detect()).resolves.toBe("203.0.113.7");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      "https://first.test",
      expect.objectContaining({ headers: { "User-Agent": "portwarden" } })
    );
  });

  it("should fall through failing and invalid services", async () => {
    const log = jest.fn();
    const fetchFn = mockFetch()
      .mockResolvedValueOnce(response("<html>blocked</html>"))
      .mockResolvedValueOnce(response("198.51.100.20"));
    const service = new PublicIpService(fetchFn, log, SERVICES);

    await expect(service.detect()).resolves.toBe("198.51.100.20");
    expect(log).toHaveBeenCalledWith("https://first.test returned an invalid address", "detail");
  });

  it("should throw when every service fails", async () => {
    const log = jest.fn();
    const fetchFn = mockFetch()
      .mockResolvedValueOnce(response("", 503))
      .mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND"));
    const service = new PublicIpService(fetchFn, log, SERVICES);

    await expect(service.detect()).rejects.toThrow("Failed to detect public IP address. Pass it with --ip.");
    expect(log).toHaveBeenCalledWith("https://first.test: HTTP 503", "detail");
    expect(log).toHaveBeenCalledWith("https://second.test: getaddrinfo ENOTFOUND", "detail");
  });
});
