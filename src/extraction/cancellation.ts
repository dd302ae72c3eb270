/**
 * Cooperative stop signal. Work loops check `cancelled` between documents;
 * nothing is interrupted mid-call.
 */
export class CancellationToken {
  private _reason: string | null = null;

  get cancelled(): boolean {
    return this._reason !== null;
  }

  get reason(): string | null {
    return this._reason;
  }

  cancel(reason = "cancelled"): void {
    if (this._reason === null) this._reason = reason;
  }
}
