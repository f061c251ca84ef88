import assert from "node:assert";
import { describe, it } from "node:test";

import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";

import { ChannelLookupError, HttpRoomResolver, resolveTarget, sameTarget, type RoomResolver } from "./channel-resolver";

function stubHttp(reply: (config: InternalAxiosRequestConfig) => { status: number; data: unknown }) {
  const urls: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    urls.push(`${config.baseURL ?? ""}${config.url ?? ""}`);
    const { status, data } = reply(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, null, response);
    }
    return response;
  };
  return { http: axios.create({ baseURL: "https://api.test/v2", adapter }), urls };
}

describe("HttpRoomResolver", () => {
  it("reads the chatroom and channel ids", async () => {
    const { http, urls } = stubHttp(() => ({ status: 200, data: { id: 7, chatroom: { id: 1234 } } }));
    const resolver = new HttpRoomResolver("https://api.test/v2", 1_000, http);

    assert.deepStrictEqual(await resolver.resolve("some streamer"), { roomId: "1234", platformChannelId: "7" });
    assert.deepStrictEqual(urls, ["https://api.test/v2/channels/some%20streamer"]);
  });

  it("rejects bodies without a chatroom id", async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { id: 7 } }));
    const resolver = new HttpRoomResolver("https://api.test/v2", 1_000, http);

    await assert.rejects(resolver.resolve("ghost"), {
      name: "ChannelLookupError",
      message: "channel lookup returned no chatroom id",
    });
  });

  it("wraps http failures with the status code", async () => {
    const { http } = stubHttp(() => ({ status: 404, data: { message: "not found" } }));
    const resolver = new HttpRoomResolver("https://api.test/v2", 1_000, http);

    await assert.rejects(resolver.resolve("missing"), (error: unknown) => {
      assert.ok(error instanceof ChannelLookupError);
      assert.strictEqual(error.status, 404);
      assert.strictEqual(error.channelSlug, "missing");
      return true;
    });
  });
});

describe("resolveTarget", () => {
  const resolver: RoomResolver = { resolve: async () => ({ roomId: "900", platformChannelId: "9" }) };

  it("prefers the configured room id", async () => {
    const config = { tenantId: "t1", channelSlug: "one", roomId: "100", revision: 1, enabled: true };
    assert.deepStrictEqual(await resolveTarget(config, resolver), { roomId: "100" });
  });

  it("keeps a configured platform channel over the looked-up one", async () => {
    const config = { tenantId: "t1", channelSlug: "one", platformChannelId: "5", revision: 1, enabled: true };
    assert.deepStrictEqual(await resolveTarget(config, resolver), { roomId: "900", platformChannelId: "5" });
  });

  it("compares both ids", () => {
    assert.strictEqual(sameTarget({ roomId: "1" }, { roomId: "1" }), true);
    assert.strictEqual(sameTarget({ roomId: "1" }, { roomId: "1", platformChannelId: "2" }), false);
  });
});
