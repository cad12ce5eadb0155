import { AsyncLocalStorage } from "async_hooks";
import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";

/**
 * Single lock shared by every balance-mutating operation of a table.
 *
 * Operations from independent callers queue behind each other. A call made
 * from inside a running operation (a wallet callback, say) would wait on
 * itself, so it is rejected instead.
 */
export class ReentrancyGuard {
  private readonly active = new AsyncLocalStorage<string>();
  private tail: Promise<void> = Promise.resolve();
  private locked = false;

  isLocked(): boolean {
    return this.locked;
  }

  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const current = this.active.getStore();
    if (current !== undefined) {
      return Promise.reject(
        new HouseError(HouseErrorCode.REENTRANCY, `Reentrant call to ${operation} while ${current} is running`, {
          operation,
          running: current,
        })
      );
    }

    const result = this.tail.then(() => this.enter(operation, fn));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async enter<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.locked = true;
    try {
      return await this.active.run(operation, fn);
    } finally {
      this.locked = false;
    }
  }
}
