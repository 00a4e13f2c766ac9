import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { ApiResponse, failure } from '../handlers/payloads';
import { errorHandler, toError } from '../utils/error-handler';
import { logger } from '../utils/logger';

export type MessageHandler = (type: number, data: string) => Promise<ApiResponse>;

export interface HostMessage {
  type: number;
  data: string;
}

export interface HostReply {
  type: number;
  response: ApiResponse;
}

/**
 * Parses one input line. `data` is handed on verbatim when it is a string and
 * re-serialized otherwise.
 */
export function parseHostMessage(line: string): HostMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    logger.warn('Discarding malformed host message', { error: toError(error).message });
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }
  if (typeof parsed.type !== 'number' || !Number.isInteger(parsed.type)) {
    return null;
  }

  const data = 'data' in parsed ? parsed.data : undefined;
  return {
    type: parsed.type,
    data: typeof data === 'string' ? data : JSON.stringify(data ?? null),
  };
}

/**
 * Newline-delimited JSON transport: `{"type", "data"}` in, `{"type", "response"}` out.
 * Messages are handled one at a time in arrival order.
 */
export class StdioPluginHost {
  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  async listen(handler: MessageHandler): Promise<void> {
    const lines = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    logger.info('Listening for host messages');

    for await (const line of lines) {
      if (line.trim() === '') {
        continue;
      }

      const message = parseHostMessage(line);
      if (!message) {
        this.send({ type: 0, response: failure('Invalid message') });
        continue;
      }

      let response: ApiResponse;
      try {
        response = await handler(message.type, message.data);
      } catch (error) {
        response = failure(errorHandler.handleError(error, { operation: 'hostMessage' }).message);
      }
      this.send({ type: message.type, response });
    }

    logger.info('Host input closed');
  }

  private send(reply: HostReply): void {
    this.output.write(`${JSON.stringify(reply)}\n`);
  }
}
