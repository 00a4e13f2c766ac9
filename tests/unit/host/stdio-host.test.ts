import { once } from 'events';
import { PassThrough } from 'stream';
import { ApiResponse } from '../../../src/handlers/payloads';
import { parseHostMessage, StdioPluginHost } from '../../../src/host/stdio-host';

describe('parseHostMessage', () => {
  it('should pass string data through unchanged', () => {
    expect(parseHostMessage('{"type":2,"data":"{\\"params\\":{}}"}')).toEqual({ type: 2, data: '{"params":{}}' });
  });

  it('should serialize object data', () => {
    expect(parseHostMessage('{"type":5,"data":{"refresh_interval":60}}')).toEqual({
      type: 5,
      data: '{"refresh_interval":60}',
    });
  });

  it('should default missing data to null', () => {
    expect(parseHostMessage('{"type":1}')).toEqual({ type: 1, data: 'null' });
  });

  it.each([
    ['not json'],
    ['[1,2]'],
    ['{"data":"x"}'],
    ['{"type":"1"}'],
    ['{"type":1.5}'],
  ])('should reject %s', (line) => {
    expect(parseHostMessage(line)).toBeNull();
  });
});

describe('StdioPluginHost', () => {
  async function run(lines: string[], handler: (type: number, data: string) => Promise<ApiResponse>): Promise<unknown[]> {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));

    const host = new StdioPluginHost(input, output);
    const listening = host.listen(handler);
    input.end(lines.join('\n'));
    await listening;
    output.end();
    await once(output, 'end');

    return chunks.join('').split('\n').filter(line => line !== '').map(line => JSON.parse(line));
  }

  it('should answer each message in order', async () => {
    const handler = jest.fn(async (type: number, data: string): Promise<ApiResponse> => ({
      success: true,
      data: `${type}:${data}`,
    }));

    const replies = await run(['{"type":3,"data":""}', '', '{"type":4,"data":"x"}'], handler);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(replies).toEqual([
      { type: 3, response: { success: true, data: '3:' } },
      { type: 4, response: { success: true, data: '4:x' } },
    ]);
  });

  it('should reply to malformed lines and keep listening', async () => {
    const handler = jest.fn(async (): Promise<ApiResponse> => ({ success: true, data: 'ok' }));

    const replies = await run(['{oops', '{"type":1,"data":""}'], handler);

    expect(replies).toEqual([
      { type: 0, response: { success: false, error: 'Invalid message' } },
      { type: 1, response: { success: true, data: 'ok' } },
    ]);
  });

  it('should turn a handler failure into an error reply', async () => {
    const handler = jest.fn(async (): Promise<ApiResponse> => {
      throw new Error('handler exploded');
    });

    const replies = await run(['{"type":6,"data":""}'], handler);

    expect(replies).toEqual([{ type: 6, response: { success: false, error: 'handler exploded' } }]);
  });
});
