import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { COMMAND_USAGE, USAGE, UsageError, parseArgs, run } from "./cli";
import { startTestServer, type TestServer } from "./testServer";

describe("parseArgs", () => {
  it("parses get", () => {
    expect(parseArgs(["get", "foo"])).toEqual({
      kind: "run",
      command: { name: "get", switchName: "foo" }
    });
  });

  it("parses set with server and delay in any position", () => {
    expect(
      parseArgs(["set", "-s", "relay:1", "porch light", "on", "--delay", "5"])
    ).toEqual({
      kind: "run",
      server: "relay:1",
      command: {
        name: "set",
        switchName: "porch light",
        state: "on",
        delay: "5"
      }
    });
  });

  it("parses list with --server=", () => {
    expect(parseArgs(["--server=relay", "list"])).toEqual({
      kind: "run",
      server: "relay",
      command: { name: "list" }
    });
  });

  it("keeps numeric positionals as strings", () => {
    expect(parseArgs(["set", "42", "1"])).toEqual({
      kind: "run",
      command: { name: "set", switchName: "42", state: "1" }
    });
  });

  it("recognizes help anywhere", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["toggle", "-h"])).toEqual({ kind: "help" });
  });

  it("ties help to the subcommand it follows", () => {
    expect(parseArgs(["get", "-h"])).toEqual({ kind: "help", command: "get" });
    expect(parseArgs(["-s", "relay", "set", "--help"])).toEqual({
      kind: "help",
      command: "set"
    });
  });

  it.each([
    [[], "Missing subcommand: expected one of get, set, list"],
    [["toggle", "foo"], "Unrecognized subcommand: toggle"],
    [["get"], "Missing required argument: switch_name"],
    [["set"], "Missing required argument: switch_name, state"],
    [["set", "foo"], "Missing required argument: state"],
    [["get", "foo", "bar"], "Unrecognized argument: bar"],
    [["list", "--verbose"], "Unrecognized argument: --verbose"],
    [["get", "foo", "-d", "3"], "Unrecognized argument: --delay"],
    [["get", "foo", "-s"], "Missing value for option '--server'"],
    [["-s", "a", "-s", "b", "list"], "Duplicate option: --server"]
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new UsageError(message));
  });
});

describe("run", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await server.close();
  });

  const logged = () => vi.mocked(console.log).mock.calls;
  const errored = () => vi.mocked(console.error).mock.calls;

  it("gets a switch from the server named by the flag", async () => {
    server.app.get("/api/switch/:name", (_req, res) => {
      res.json({ state: "on", transitioning: "false" });
    });

    await expect(run(["-s", server.host, "get", "foo"], {})).resolves.toBe(0);

    expect(logged()).toEqual([
      ["state         : on"],
      ["transitioning : false"]
    ]);
    expect(errored()).toEqual([]);
  });

  it("uses BEELAY_SERVER when no flag is given", async () => {
    server.app.get("/api/switches/", (_req, res) => {
      res.json({ switches: ["a", "b", "c"] });
    });

    await run(["list"], { BEELAY_SERVER: server.address });

    expect(logged()).toEqual([
      ["Switch list:"],
      ["    a"],
      ["    b"],
      ["    c"]
    ]);
  });

  it("prefers the flag over BEELAY_SERVER", async () => {
    server.app.get("/api/switches/", (_req, res) => {
      res.json({ switches: [] });
    });

    await run(["list", "--server", server.host], {
      BEELAY_SERVER: "127.0.0.1:1"
    });

    expect(logged()).toEqual([["Switch list:"]]);
  });

  it("does not send the delay", async () => {
    server.app.post("/api/switch/:name", (_req, res) => {
      res.json({ state: "off", transitioning: "true" });
    });

    await run(["-s", server.host, "set", "foo", "off", "-d", "10"], {});

    expect(server.requests).toEqual([
      { method: "POST", url: "/api/switch/foo?state=off", switchName: "foo" }
    ]);
    expect(logged()).toEqual([
      ["state         : off"],
      ["transitioning : true"]
    ]);
  });

  it("reports request errors on stderr and exits normally", async () => {
    server.app.get("/api/switch/:name", (_req, res) => {
      res.status(404).json({ error_message: "not found" });
    });

    await expect(run(["-s", server.host, "get", "foo"], {})).resolves.toBe(0);

    expect(errored()).toEqual([
      ["Error during beelay request:"],
      ["    404 Not Found response: not found"]
    ]);
    expect(logged()).toEqual([]);
  });

  it("reports parse failures on stderr", async () => {
    server.app.get("/api/switches/", (_req, res) => {
      res.json({ names: [] });
    });

    await expect(run(["-s", server.host, "list"], {})).resolves.toBe(0);

    expect(errored()).toEqual([
      ["Error during beelay request:"],
      ["    Failed to parse response: switches: Required"]
    ]);
  });

  it("prints usage for --help", async () => {
    await expect(run(["--help"], {})).resolves.toBe(0);

    expect(logged()).toEqual([[USAGE]]);
    expect(server.requests).toEqual([]);
  });

  it("prints the subcommand's usage for set --help", async () => {
    await expect(run(["set", "--help"], {})).resolves.toBe(0);

    expect(logged()).toEqual([[COMMAND_USAGE.set]]);
    expect(COMMAND_USAGE.set.split("\n")).toEqual(
      expect.arrayContaining([
        '  state             state ("on" or "off")',
        "  -d, --delay       state change delay"
      ])
    );
  });

  it("reports a body cut off mid-read", async () => {
    server.app.get("/api/switch/:name", (_req, res) => {
      res.writeHead(500, { "Content-Length": "100" });
      res.write('{"error_mes', () => res.socket?.destroy());
    });

    await expect(run(["-s", server.host, "get", "foo"], {})).resolves.toBe(0);

    expect(errored()).toEqual([
      ["Error during beelay request:"],
      ["    Failed to get text body from response"]
    ]);
  });

  it("exits with 1 on usage errors without sending a request", async () => {
    await expect(run(["-s", server.host, "get"], {})).resolves.toBe(1);

    expect(errored()).toEqual([
      ["Missing required argument: switch_name"],
      ["Run beelay --help for more information."]
    ]);
    expect(server.requests).toEqual([]);
  });
});
