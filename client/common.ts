import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { STATUS_CODES } from "http";
import { Readable } from "stream";
import { z } from "zod";

export const SERVER_ENV_VAR = "BEELAY_SERVER";
export const DEFAULT_SERVER_ADDRESS = "http://localhost:9999";

const SwitchStateResponse = z.object({
  state: z.string(),
  transitioning: z.string()
});

const SwitchesResponse = z.object({
  switches: z.array(z.string())
});

const ErrorResponse = z.object({
  error_message: z.string()
});

export type SwitchState = z.infer<typeof SwitchStateResponse>;
export type SwitchList = z.infer<typeof SwitchesResponse>;

/**
 * Raised for every failure the client detects itself: bad status codes,
 * unreadable bodies and bodies that do not match the expected shape.
 * Transport failures surface as the axios error instead.
 */
export class SwitchRequestError extends Error {
  status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "SwitchRequestError";
    this.status = status;
  }
}

/**
 * Only a literal "http://" prefix counts as a scheme, so "https://host"
 * becomes "http://https://host/".
 */
export function normalizeServerAddress(address: string): string {
  let normalized = address;
  if (!normalized.startsWith("http://")) {
    normalized = `http://${normalized}`;
  }
  if (!normalized.endsWith("/")) {
    normalized = `${normalized}/`;
  }
  return normalized;
}

// flag > environment > default
export function resolveServerAddress(
  flag: string | undefined,
  environmentValue: string | undefined,
  fallback: string = DEFAULT_SERVER_ADDRESS
): string {
  return normalizeServerAddress(flag ?? environmentValue ?? fallback);
}

/** Spaces are the only characters escaped in the switch name. */
export function toSwitchUrl(serverAddress: string, switchName: string): string {
  return `${serverAddress}api/switch/${switchName.split(" ").join("%20")}`;
}

export function toSwitchesUrl(serverAddress: string): string {
  return `${serverAddress}api/switches/`;
}

function describeIssues(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return error.message;
  }
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parses `text` as JSON and checks it against `schema`. Throws a plain Error
 * whose message is the syntax error or the first schema issue.
 */
function parseJson<T>(schema: z.ZodType<T>, text: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(describeError(err));
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(describeIssues(result.error));
  }
  return result.data;
}

// the standard reason phrase, whatever text the server sent
function statusLine(resp: AxiosResponse<unknown>): string {
  const reason = STATUS_CODES[resp.status];
  return reason ? `${resp.status} ${reason}` : `${resp.status}`;
}

function isSuccess(resp: AxiosResponse<unknown>): boolean {
  return resp.status >= 200 && resp.status < 300;
}

/**
 * The response arrives as soon as the headers do, so a connection that drops
 * mid-body fails here rather than in the request itself.
 */
async function readBody(resp: AxiosResponse<unknown>): Promise<string> {
  const body = resp.data;
  if (!(body instanceof Readable)) {
    throw new SwitchRequestError(
      "Failed to get text body from response",
      resp.status
    );
  }
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch {
    throw new SwitchRequestError(
      "Failed to get text body from response",
      resp.status
    );
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function parseResponse<T>(
  schema: z.ZodType<T>,
  resp: AxiosResponse<unknown>
): Promise<T> {
  const text = await readBody(resp);
  try {
    return parseJson(schema, text);
  } catch (err) {
    throw new SwitchRequestError(
      `Failed to parse response: ${describeError(err)}`,
      resp.status
    );
  }
}

async function badStatusCode(
  resp: AxiosResponse<unknown>
): Promise<SwitchRequestError> {
  const text = await readBody(resp);
  try {
    const { error_message } = parseJson(ErrorResponse, text);
    return new SwitchRequestError(
      `${statusLine(resp)} response: ${error_message}`,
      resp.status
    );
  } catch (err) {
    return new SwitchRequestError(
      `Could not retrieve error message for ${statusLine(resp)} response: ${describeError(err)}`,
      resp.status
    );
  }
}

/**
 * Every status is handed back to the caller and the body is left as an unread
 * stream, so the client decides what counts as an error and how to parse it.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    responseType: "stream",
    transformResponse: (data: unknown) => data,
    validateStatus: () => true
  });
}

export class Client {
  server: string;
  http: AxiosInstance;

  constructor(server: string, http: AxiosInstance = createHttpClient()) {
    this.server = server;
    this.http = http;
  }

  async getSwitch(switchName: string): Promise<SwitchState> {
    const resp = await this.http.get<unknown>(
      toSwitchUrl(this.server, switchName)
    );
    return await this.printSwitchState(resp);
  }

  async setSwitch(switchName: string, state: string): Promise<SwitchState> {
    const resp = await this.http.post<unknown>(
      toSwitchUrl(this.server, switchName),
      undefined,
      { params: { state } }
    );
    return await this.printSwitchState(resp);
  }

  async listSwitches(): Promise<SwitchList> {
    const resp = await this.http.get<unknown>(toSwitchesUrl(this.server));
    if (!isSuccess(resp)) {
      throw await badStatusCode(resp);
    }
    const list = await parseResponse(SwitchesResponse, resp);

    console.log("Switch list:");
    for (const name of list.switches) {
      console.log(`    ${name}`);
    }
    return list;
  }

  private async printSwitchState(
    resp: AxiosResponse<unknown>
  ): Promise<SwitchState> {
    if (!isSuccess(resp)) {
      throw await badStatusCode(resp);
    }
    const switchState = await parseResponse(SwitchStateResponse, resp);

    console.log(`state         : ${switchState.state}`);
    console.log(`transitioning : ${switchState.transitioning}`);
    return switchState;
  }
}
