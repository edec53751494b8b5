import type { AccountContext } from "../../src/shared/config/account";
import { createTransportStub } from "../helpers/transportStub";

const account: AccountContext = { channel: "cloud", token: "test-token", url: "http://localhost:3999" };

describe("composition root", () => {
  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("wires the HTTP transport with the validated account and env timeout", async () => {
    const transport = createTransportStub();
    const httpCtor = jest.fn().mockImplementation(() => transport);
    jest.doMock("../../src/infrastructure/runtime-api/RuntimeApiHttpTransport", () => ({
      RuntimeApiHttpTransport: httpCtor
    }));

    const { createRuntimeClient } = await import("../../src/composition/root");
    const client = createRuntimeClient(account, { RUNTIME_REQUEST_TIMEOUT_MS: "1500", RUNTIME_POLL_INITIAL_MS: "50" });

    expect(httpCtor).toHaveBeenCalledWith(account, 1500);
    expect(client.scheduler.config.pollInitialDelayMs).toBe(50);
    expect(client.catalog).toBeDefined();
  });

  it("uses an injected transport instead of HTTP", async () => {
    const httpCtor = jest.fn();
    jest.doMock("../../src/infrastructure/runtime-api/RuntimeApiHttpTransport", () => ({
      RuntimeApiHttpTransport: httpCtor
    }));
    const transport = createTransportStub();
    transport.listInstances.mockResolvedValue([{ id: "open/main/main", backends: ["sim_a"] }]);

    const { createRuntimeClient } = await import("../../src/composition/root");
    const client = createRuntimeClient(account, {}, { transport });

    await expect(client.listInstances()).resolves.toEqual([{ id: "open/main/main", backends: ["sim_a"] }]);
    expect(httpCtor).not.toHaveBeenCalled();
  });

  it("fails fast on an invalid account", async () => {
    const { createRuntimeClient } = await import("../../src/composition/root");

    expect(() => createRuntimeClient({ ...account, url: "localhost" }, {})).toThrow(
      "url must be a valid absolute http/https URL. Received: localhost"
    );
  });

  it("fails fast when runtime caps are violated", async () => {
    const { createRuntimeClient } = await import("../../src/composition/root");

    expect(() => createRuntimeClient(account, { RUNTIME_TRANSPORT_RETRIES: "99" })).toThrow(
      "RUNTIME_TRANSPORT_RETRIES=99 is out of allowed range [0..10]"
    );
  });
});
