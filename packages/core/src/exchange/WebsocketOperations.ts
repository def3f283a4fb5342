import type { ExchangeTransport } from '../transports/index.js';
import type { ResponseHead } from '../http/index.js';
import { HttpOperations } from './HttpOperations.js';

/**
 * Outbound side of a websocket exchange, built by upgrading a response.
 *
 * Its header commit writes the `101 Switching Protocols` handshake; text goes
 * out as text frames.
 */
export class WebsocketOperations extends HttpOperations {
  private readonly requestMethod: string;
  private readonly target: string;

  constructor(
    transport: ExchangeTransport,
    private readonly handshake: ResponseHead,
    replaced: HttpOperations,
  ) {
    super(transport, {}, replaced);
    this.requestMethod = replaced.method();
    this.target = replaced.uri();
  }

  public method(): string {
    return this.requestMethod;
  }

  public uri(): string {
    return this.target;
  }

  public override isWebsocket(): boolean {
    return true;
  }

  protected commitHeaders(signal: AbortSignal): Promise<void> {
    return this.transport.writeHead(this.handshake, signal);
  }
}
