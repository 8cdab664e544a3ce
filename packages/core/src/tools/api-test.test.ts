import { describe, it, expect, vi } from "vitest";
import { createApiTestTool, type RequestFn } from "./api-test.js";

function fakeRequest(body: string, status = 200) {
  return vi.fn<RequestFn>(async () => new Response(body, { status }));
}

describe("api_test tool", () => {
  it("reports status, length and the body", async () => {
    const request = fakeRequest('{"ok":true}');
    const tool = createApiTestTool({ fetch: request });

    await expect(tool.execute({ url: "https://api.example.com/health" })).resolves.toBe(
      'Status: 200, Length: 11, Body Snippet: {"ok":true}',
    );
    expect(request).toHaveBeenCalledTimes(1);
    expect(request.mock.calls[0][0]).toBe("https://api.example.com/health");
    expect(request.mock.calls[0][1].method).toBe("GET");
  });

  it("truncates long bodies to a short snippet", async () => {
    const tool = createApiTestTool({ fetch: fakeRequest("x".repeat(150), 503) });

    await expect(tool.execute({ url: "https://api.example.com/" })).resolves.toBe(
      `Status: 503, Length: 150, Body Snippet: ${"x".repeat(100)}... [TRUNCATED]`,
    );
  });

  it("sends the requested method", async () => {
    const request = fakeRequest("");
    const tool = createApiTestTool({ fetch: request });

    await tool.execute({ url: "https://api.example.com/items/1", method: "DELETE" });

    expect(request.mock.calls[0][1].method).toBe("DELETE");
  });

  it("refuses blocked hosts without sending anything", async () => {
    const request = fakeRequest("");
    const tool = createApiTestTool({ fetch: request });

    await expect(tool.execute({ url: "http://LOCALHOST:8080/admin" })).resolves.toBe(
      'Error: Access to blocked hostname "localhost" is restricted.',
    );
    await expect(tool.execute({ url: "http://169.254.169.254/latest/meta-data" })).resolves.toBe(
      'Error: Access to blocked hostname "169.254.169.254" is restricted.',
    );
    await expect(tool.execute({ url: "http://[::1]/" })).resolves.toBe(
      'Error: Access to blocked hostname "[::1]" is restricted.',
    );
    expect(request).not.toHaveBeenCalled();
  });

  it("takes a custom block list", async () => {
    const tool = createApiTestTool({ fetch: fakeRequest("ok"), blockedHosts: ["Internal.Example.com"] });

    await expect(tool.execute({ url: "https://internal.example.com/" })).resolves.toBe(
      'Error: Access to blocked hostname "internal.example.com" is restricted.',
    );
    await expect(tool.execute({ url: "http://localhost/" })).resolves.toBe("Status: 200, Length: 2, Body Snippet: ok");
  });

  it("rejects invalid URLs and non-http schemes", async () => {
    const tool = createApiTestTool({ fetch: fakeRequest("") });

    await expect(tool.execute({ url: "not a url" })).resolves.toBe('Error: "not a url" is not a valid URL.');
    await expect(tool.execute({ url: "file:///etc/hosts" })).resolves.toBe(
      'Error: Only http and https URLs are supported, got "file:".',
    );
  });

  it("reports connection failures as a result", async () => {
    const tool = createApiTestTool({
      fetch: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });

    await expect(tool.execute({ url: "https://api.example.com/" })).resolves.toBe(
      "Error testing API: connect ECONNREFUSED",
    );
  });

  it("asks for confirmation before anything but GET", () => {
    const tool = createApiTestTool();

    expect(tool.requiresConfirmation?.({ url: "https://api.example.com/" })).toBe(false);
    expect(tool.requiresConfirmation?.({ url: "https://api.example.com/", method: "POST" })).toBe(true);
    expect(tool.parameters.required).toEqual(["url"]);
    expect(tool.parameters.properties).toHaveProperty("confirmed");
  });
});
