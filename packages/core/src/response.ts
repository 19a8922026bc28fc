import { XMLParser } from "fast-xml-parser";
import type { ZodType, ZodTypeDef } from "zod";
import { DecodingError } from "./errors";
import type LogicalRequest from "./logical-request";
import type { WireRequest } from "./models/request-params";
import type { TransportResponse } from "./transport";
import { dumpExchange } from "./utils/dump";

const decoder = new TextDecoder("utf-8");

// Attributes are kept under an "@_" prefix next to child elements
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

/**
 * Response produced by one execution of a LogicalRequest. The body is read
 * from the transport on first access and cached, together with any read
 * error, for every later call.
 */
export default class HttpResponse {
  public readonly status: number;
  public readonly statusText: string;
  public readonly headers: Headers;

  private body?: Promise<Uint8Array>;

  constructor(
    public readonly request: LogicalRequest,
    public readonly wire: WireRequest,
    private readonly source: TransportResponse
  ) {
    this.status = source.status;
    this.statusText = source.statusText;
    this.headers = source.headers;
  }

  public bytes(): Promise<Uint8Array> {
    if (!this.body) {
      this.body = this.source.readBody();
    }
    return this.body;
  }

  public async text(): Promise<string> {
    return decoder.decode(await this.bytes());
  }

  /**
   * Parses the body as JSON, optionally validating it against a zod schema.
   *
   * @throws {DecodingError} If the body is not valid JSON or does not match the schema
   */
  public json(): Promise<unknown>;
  public json<T>(schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  public async json<T>(
    schema?: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T | unknown> {
    const text = await this.text();
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new DecodingError(
        `Response from ${this.wire.url.href} is not valid JSON`,
        { cause: error }
      );
    }
    return this.conform(value, schema);
  }

  /**
   * Parses the body as XML into plain objects, optionally validating the
   * result against a zod schema.
   *
   * @throws {DecodingError} If the body is not well-formed XML or does not match the schema
   */
  public xml(): Promise<unknown>;
  public xml<T>(schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  public async xml<T>(
    schema?: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T | unknown> {
    const text = await this.text();
    let value: unknown;
    try {
      value = xmlParser.parse(text, true);
    } catch (error) {
      throw new DecodingError(
        `Response from ${this.wire.url.href} is not valid XML`,
        { cause: error }
      );
    }
    return this.conform(value, schema);
  }

  private conform<T>(
    value: unknown,
    schema?: ZodType<T, ZodTypeDef, unknown>
  ): T | unknown {
    if (!schema) {
      return value;
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new DecodingError(
        `Response from ${this.wire.url.href} does not match the expected shape`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Renders the request, this response and the timing summary as text.
   */
  public dump(): Promise<string> {
    return dumpExchange(this);
  }
}
