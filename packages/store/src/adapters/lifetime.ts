import { StorageError } from "../core/store-errors"

/** Guards transaction-scoped handles against use after the transaction ends. */
export class Lifetime {
  private open = true

  end(): void {
    this.open = false
  }

  assertOpen(): void {
    if (!this.open) throw StorageError.transactionClosed()
  }
}
