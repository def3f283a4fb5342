const NOT_SENT = 0;
const SENT = 1;

type GateState = typeof NOT_SENT | typeof SENT;

/**
 * Single-winner guard around the header commit of one exchange.
 *
 * The check and the set happen in the same synchronous turn of the event loop,
 * so exactly one caller ever observes `true` from {@link SendGate.tryWin},
 * however many send attempts race for it.
 */
export class SendGate {
  private state: GateState = NOT_SENT;

  /**
   * Flips the gate from "not sent" to "sent".
   *
   * @returns `true` for the first caller only.
   */
  public tryWin(): boolean {
    if (this.state !== NOT_SENT) return false;
    this.state = SENT;
    return true;
  }

  public hasSent(): boolean {
    return this.state === SENT;
  }
}
