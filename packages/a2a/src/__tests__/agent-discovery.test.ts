import { DiscoveryError } from "@a2a-bridge/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AgentCardCache } from "../agent-card-cache.js";
import { AgentDiscovery, joinUrl, renderAgentCard } from "../agent-discovery.js";
import { buildAuthConfig } from "../auth-resolver.js";
import { ClientRegistry } from "../client-registry.js";
import { LEGACY_AGENT_CARD_PATH, type ResolvedClientConfig } from "../types.js";
import {
  createFakeNetwork,
  createRawAgentCard,
  type FakeAgent,
  FakeTransport,
} from "./helpers.js";

const URL_A = "https://a.test";
const URL_B = "https://b.test";
const URL_DOWN = "https://down.test";

/** FakeTransport whose card fetch waits for a gate */
class GatedTransport extends FakeTransport {
  constructor(
    config: ResolvedClientConfig,
    agent: FakeAgent,
    private readonly gate: Promise<void>,
  ) {
    super(config, agent);
  }

  override async getJson(target: string): Promise<unknown> {
    await this.gate;
    return super.getJson(target);
  }
}

function setup(
  agents: Readonly<Record<string, FakeAgent>>,
  options: { knownAgentUrls?: readonly string[]; agentCardPath?: string } = {},
) {
  const network = createFakeNetwork(agents);
  const registry = new ClientRegistry({
    authConfig: buildAuthConfig({}),
    transportFactory: network.factory,
  });
  const cache = new AgentCardCache();
  const discovery = new AgentDiscovery({ registry, cache, ...options });
  return { network, registry, cache, discovery };
}

describe("joinUrl", () => {
  it("does not double the slash", () => {
    expect(joinUrl("https://a.test/", "/x.json")).toBe("https://a.test/x.json");
    expect(joinUrl("https://a.test/agents/one", "/x.json")).toBe("https://a.test/agents/one/x.json");
  });
});

describe("renderAgentCard", () => {
  it("returns a deep copy", () => {
    const card = { name: "A", capabilities: { streaming: true } };
    const rendered = renderAgentCard(card);

    expect(rendered).toEqual(card);
    expect(rendered).not.toBe(card);
    expect(rendered.capabilities).not.toBe(card.capabilities);
  });
});

describe("AgentDiscovery", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("discover", () => {
    it("fetches the card from the well-known path and caches it", async () => {
      const { network, cache, discovery } = setup({ [URL_A]: { card: createRawAgentCard() } });

      const card = await discovery.discover(URL_A);

      expect(card.name).toBe("Test Agent");
      expect(network.transportFor(URL_A)?.gets).toEqual([
        "https://a.test/.well-known/agent-card.json",
      ]);
      expect(cache.get(URL_A)).toEqual(card);
    });

    it("keeps unknown card fields", async () => {
      const { discovery } = setup({
        [URL_A]: { card: createRawAgentCard({ provider: { organization: "Example Org" } }) },
      });

      const card = await discovery.discover(URL_A);

      expect(card.provider).toEqual({ organization: "Example Org" });
      expect(card.skills).toHaveLength(1);
    });

    it("answers a repeated call from the cache", async () => {
      const { network, discovery } = setup({ [URL_A]: { card: createRawAgentCard() } });

      const first = await discovery.discover(URL_A);
      const second = await discovery.discover(URL_A);

      expect(second).toBe(first);
      expect(network.transportFor(URL_A)?.gets).toHaveLength(1);
    });

    it("shares one fetch between concurrent misses", async () => {
      const { network, discovery } = setup({ [URL_A]: { card: createRawAgentCard() } });

      const [a, b] = await Promise.all([discovery.discover(URL_A), discovery.discover(URL_A)]);

      expect(a).toBe(b);
      expect(network.transportFor(URL_A)?.gets).toHaveLength(1);
    });

    it("lets one caller abort without failing another caller sharing the fetch", async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const registry = new ClientRegistry({
        authConfig: buildAuthConfig({}),
        transportFactory: (config) => new GatedTransport(config, { card: createRawAgentCard() }, gate),
      });
      const cache = new AgentCardCache();
      const discovery = new AgentDiscovery({ registry, cache });
      const controller = new AbortController();

      const first = discovery.discover(URL_A, controller.signal);
      const second = discovery.discover(URL_A);
      controller.abort(new Error("caller gave up"));
      release();

      const error = await first.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(DiscoveryError);
      expect(error).toHaveProperty(
        "message",
        'A2A discovery failed for "https://a.test": caller gave up',
      );
      await expect(second).resolves.toMatchObject({ name: "Test Agent" });
      expect(cache.has(URL_A)).toBe(true);
    });

    it("rejects an already-aborted caller without fetching", async () => {
      const { network, discovery } = setup({ [URL_A]: { card: createRawAgentCard() } });

      await expect(discovery.discover(URL_A, AbortSignal.abort())).rejects.toThrow(DiscoveryError);
      expect(network.transports).toHaveLength(0);
    });

    it("falls back to the legacy path on 404", async () => {
      const { network, discovery } = setup({
        [URL_A]: { card: createRawAgentCard({ name: "Legacy" }), cardPath: LEGACY_AGENT_CARD_PATH },
      });

      const card = await discovery.discover(URL_A);

      expect(card.name).toBe("Legacy");
      expect(network.transportFor(URL_A)?.gets).toEqual([
        "https://a.test/.well-known/agent-card.json",
        "https://a.test/.well-known/agent.json",
      ]);
    });

    it("does not fall back when a custom card path is configured", async () => {
      const { network, discovery } = setup(
        { [URL_A]: { card: createRawAgentCard(), cardPath: LEGACY_AGENT_CARD_PATH } },
        { agentCardPath: "/cards/main.json" },
      );

      await expect(discovery.discover(URL_A)).rejects.toThrow(DiscoveryError);
      expect(network.transportFor(URL_A)?.gets).toEqual(["https://a.test/cards/main.json"]);
    });

    it("rejects a card without a name and caches nothing", async () => {
      const { cache, discovery } = setup({
        [URL_A]: { card: { description: "nameless" } },
      });

      const error = await discovery.discover(URL_A).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DiscoveryError);
      expect(error).toHaveProperty(
        "message",
        'A2A discovery failed for "https://a.test": Invalid agent card: name: Required',
      );
      expect(cache.has(URL_A)).toBe(false);
    });

    it("wraps transport failures in DiscoveryError", async () => {
      const { discovery } = setup({});

      const error = await discovery.discover(URL_DOWN).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DiscoveryError);
      expect(error).toHaveProperty("agentUrl", URL_DOWN);
      expect(error).toHaveProperty(
        "message",
        'A2A discovery failed for "https://down.test": A2A request to ' +
          '"https://down.test/.well-known/agent-card.json" failed: connect ECONNREFUSED',
      );
    });
  });

  describe("refresh", () => {
    it("fetches again and replaces the cached card", async () => {
      let version = 1;
      const agent: FakeAgent = {
        get card() {
          return createRawAgentCard({ version: `${version}.0.0` });
        },
      };
      const { network, discovery } = setup({ [URL_A]: agent });

      await discovery.discover(URL_A);
      version = 2;
      const refreshed = await discovery.refresh(URL_A);

      expect(refreshed.version).toBe("2.0.0");
      expect(network.transportFor(URL_A)?.gets).toHaveLength(2);
    });
  });

  describe("bulkDiscover", () => {
    it("reports partial failures without stopping the others", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { discovery } = setup({
        [URL_A]: { card: createRawAgentCard({ name: "A" }) },
        [URL_B]: { card: createRawAgentCard({ name: "B" }) },
      });

      const report = await discovery.bulkDiscover([URL_A, URL_DOWN, URL_B]);

      expect(report.discovered).toEqual([URL_A, URL_B]);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0]?.url).toBe(URL_DOWN);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toMatch(/^\[a2a\] Failed to discover agent at https:\/\/down\.test: /);
    });
  });

  describe("initial discovery", () => {
    it("runs once for concurrent and repeated callers", async () => {
      const { network, discovery } = setup(
        { [URL_A]: { card: createRawAgentCard() } },
        { knownAgentUrls: [URL_A] },
      );

      expect(discovery.initialDiscoveryDone).toBe(false);
      const first = discovery.ensureInitialDiscovery();
      const second = discovery.ensureInitialDiscovery();
      expect(second).toBe(first);
      await first;
      await discovery.ensureInitialDiscovery();

      expect(discovery.initialDiscoveryDone).toBe(true);
      expect(network.transportFor(URL_A)?.gets).toHaveLength(1);
    });

    it("is triggered by listDiscovered", async () => {
      const { discovery } = setup(
        {
          [URL_A]: { card: createRawAgentCard({ name: "A" }) },
          [URL_B]: { card: createRawAgentCard({ name: "B" }) },
        },
        { knownAgentUrls: [URL_A] },
      );

      await discovery.discover(URL_B);
      const listed = await discovery.listDiscovered();

      expect(discovery.initialDiscoveryDone).toBe(true);
      expect([...listed.keys()]).toEqual([URL_B, URL_A]);
    });

    it("does not retry failed known agents on later listings", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const { network, discovery } = setup({}, { knownAgentUrls: [URL_DOWN] });

      const first = await discovery.listDiscovered();
      const second = await discovery.listDiscovered();

      expect(first.size).toBe(0);
      expect(second.size).toBe(0);
      expect(network.transportFor(URL_DOWN)?.gets).toHaveLength(1);
    });

    it("completes with an empty known list", async () => {
      const { discovery } = setup({});

      const report = await discovery.ensureInitialDiscovery();

      expect(report).toEqual({ discovered: [], failed: [] });
      expect(discovery.initialDiscoveryDone).toBe(true);
    });
  });
});
