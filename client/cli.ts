import minimist from "minimist";
import { Client, SERVER_ENV_VAR, resolveServerAddress } from "./common";

export const USAGE = `Usage: beelay [-s <server>] <command> [<args>]

Beelay CLI client

Options:
  -s, --server      beelay server address (default: $${SERVER_ENV_VAR}, then http://localhost:9999)
  -h, --help        display usage information

Commands:
  get <switch_name>                      get switch state
  set <switch_name> <state> [-d <delay>] set switch state
  list                                   list switches`;

export const COMMAND_USAGE: Record<Command["name"], string> = {
  get: `Usage: beelay get <switch_name>

get switch state

Positional Arguments:
  switch_name       switch name

Options:
  -h, --help        display usage information`,
  set: `Usage: beelay set <switch_name> <state> [-d <delay>]

set switch state

Positional Arguments:
  switch_name       switch name
  state             state ("on" or "off")

Options:
  -d, --delay       state change delay
  -h, --help        display usage information`,
  list: `Usage: beelay list

list switches

Options:
  -h, --help        display usage information`
};

export type Command =
  | { name: "get"; switchName: string }
  | { name: "set"; switchName: string; state: string; delay?: string }
  | { name: "list" };

export type ParsedArgs =
  | { kind: "help"; command?: Command["name"] }
  | { kind: "run"; server?: string; command: Command };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const POSITIONALS: Record<Command["name"], string[]> = {
  get: ["switch_name"],
  set: ["switch_name", "state"],
  list: []
};

function isCommandName(name: string): name is Command["name"] {
  return Object.prototype.hasOwnProperty.call(POSITIONALS, name);
}

function stringOption(
  args: minimist.ParsedArgs,
  name: string
): string | undefined {
  const value: unknown = args[name];
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    throw new UsageError(`Duplicate option: --${name}`);
  }
  if (typeof value !== "string" || value === "") {
    throw new UsageError(`Missing value for option '--${name}'`);
  }
  return value;
}

/**
 * Flags may appear anywhere on the line. Positionals are always kept as
 * strings, so a switch named "42" is not turned into a number.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = minimist(argv, {
    string: ["_", "server", "delay"],
    boolean: ["help"],
    alias: { s: "server", d: "delay", h: "help" },
    unknown: (arg: string) => {
      if (arg.startsWith("-") && arg !== "-") {
        throw new UsageError(`Unrecognized argument: ${arg}`);
      }
      return true;
    }
  });

  if (args.help === true) {
    const [first] = args._.map(String);
    return first !== undefined && isCommandName(first)
      ? { kind: "help", command: first }
      : { kind: "help" };
  }

  const server = stringOption(args, "server");
  const delay = stringOption(args, "delay");

  const [name, ...rest] = args._.map(String);
  if (name === undefined) {
    throw new UsageError("Missing subcommand: expected one of get, set, list");
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unrecognized subcommand: ${name}`);
  }

  const expected = POSITIONALS[name];
  if (rest.length < expected.length) {
    throw new UsageError(
      `Missing required argument: ${expected.slice(rest.length).join(", ")}`
    );
  }
  if (rest.length > expected.length) {
    throw new UsageError(`Unrecognized argument: ${rest[expected.length]}`);
  }
  if (delay !== undefined && name !== "set") {
    throw new UsageError("Unrecognized argument: --delay");
  }

  const [switchName, state] = rest;
  switch (name) {
    case "get":
      return { kind: "run", server, command: { name, switchName } };
    case "set":
      return { kind: "run", server, command: { name, switchName, state, delay } };
    case "list":
      return { kind: "run", server, command: { name } };
  }
}

async function dispatch(client: Client, command: Command): Promise<void> {
  switch (command.name) {
    case "get":
      await client.getSwitch(command.switchName);
      break;
    case "set":
      // delay is accepted on the command line but the server has no use for it yet
      await client.setSwitch(command.switchName, command.state);
      break;
    case "list":
      await client.listSwitches();
      break;
  }
}

/**
 * Runs one invocation and resolves to the exit code. Request failures are
 * reported on stderr and still exit with 0; only usage errors exit with 1.
 */
export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error("Run beelay --help for more information.");
      return 1;
    }
    throw err;
  }

  if (parsed.kind === "help") {
    console.log(parsed.command ? COMMAND_USAGE[parsed.command] : USAGE);
    return 0;
  }

  const client = new Client(
    resolveServerAddress(parsed.server, env[SERVER_ENV_VAR])
  );
  try {
    await dispatch(client, parsed.command);
  } catch (err) {
    console.error("Error during beelay request:");
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
  return 0;
}
