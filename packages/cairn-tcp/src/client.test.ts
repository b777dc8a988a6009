import { CommandError, ConnectionError } from "@cairn/core";
import { integer } from "@cairn/wire";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Client, ClientClosedError } from "./client.ts";
import { Server } from "./server.ts";

const b = (s: string) => new TextEncoder().encode(s);

describe("Client", () => {
  let server: Server;
  let client: Client;

  beforeEach(async () => {
    server = new Server({ port: 0 }, { middleware: [] });
    const { port } = await server.listen();
    client = await Client.connect({ port });
  });

  afterEach(async () => {
    client.close();
    await server.close();
  });

  it("sets, gets and deletes", async () => {
    expect(await client.set("greeting", "hello")).toBe(1);
    expect(await client.get("greeting")).toEqual(b("hello"));
    expect(await client.delete("greeting")).toBe(true);
    expect(await client.delete("greeting")).toBe(false);
    expect(await client.get("greeting")).toBeNull();
  });

  it("sends binary keys and values untouched", async () => {
    const key = new Uint8Array([0x00, 0xff, 0x0d, 0x0a]);
    const value = new Uint8Array([0x24, 0x2d, 0x31, 0x0d, 0x0a]);
    await client.set(key, value);
    expect(await client.get(key)).toEqual(value);
  });

  it("sends numbers as their decimal text", async () => {
    await client.set("n", 42);
    await client.set("big", 9007199254740993n);
    expect(await client.get("n")).toEqual(b("42"));
    expect(await client.get("big")).toEqual(b("9007199254740993"));
  });

  it("reads and writes many keys", async () => {
    expect(
      await client.mset([
        ["a", "1"],
        ["b", "2"],
      ]),
    ).toBe(2);
    expect(await client.mget("a", "missing", "b")).toEqual([b("1"), null, b("2")]);
    expect(await client.mset(new Map([["c", "3"]]))).toBe(1);
  });

  it("flushes and counts", async () => {
    expect(await client.flush()).toBe(0);
    await client.mset([
      ["a", "1"],
      ["b", "2"],
    ]);
    expect(await client.flush()).toBe(2);
    expect(await client.get("a")).toBeNull();
  });

  it("keeps replies matched to calls made back to back", async () => {
    const results = await Promise.all([
      client.set("k", "v"),
      client.get("k"),
      client.delete("k"),
      client.get("k"),
    ]);
    expect(results).toEqual([1, b("v"), true, null]);
  });

  it("raises Error replies as CommandError and carries on", async () => {
    const error = await client.execute("NOPE").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ code: "remote", message: "Unrecognized command: NOPE" });

    await expect(client.execute("MSET", "a")).rejects.toThrow(
      "Wrong number of arguments for 'MSET' command",
    );
    expect(await client.execute("SET", "a", "1")).toEqual(integer(1));
  });

  it("fails calls after close", async () => {
    client.close();
    await expect(client.get("k")).rejects.toBeInstanceOf(ClientClosedError);
  });

  it("reports a refused connection", async () => {
    const other = new Server({ port: 0 }, { middleware: [] });
    const { port } = await other.listen();
    await other.close();

    const error = await Client.connect({ port }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ kind: "io" });
  });
});
