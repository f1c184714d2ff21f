import { PoolError } from "../codec-errors"

export type PoolStats = Readonly<{
  /** Instances waiting in the pool. */
  idle: number
  /** Instances created over the pool's lifetime. */
  created: number
}>

/**
 * Unbounded synchronous pool. An instance is exclusively owned by the caller
 * from `acquire` until `release`.
 */
export class ResourcePool<T extends object> {
  private readonly idle: T[] = []
  private readonly owned = new WeakSet<object>()
  private readonly lent = new WeakSet<T>()
  private created = 0

  constructor(
    private readonly name: string,
    private readonly create: () => T,
  ) {}

  acquire(): T {
    const instance = this.idle.pop() ?? this.make()
    this.lent.add(instance)
    return instance
  }

  /**
   * @throws PoolError when `instance` did not come from this pool or is
   * already back in it.
   */
  release(instance: T): void {
    if (!this.owned.has(instance)) throw PoolError.foreign(this.name)
    if (!this.lent.has(instance)) throw PoolError.doubleRelease(this.name)

    this.lent.delete(instance)
    this.idle.push(instance)
  }

  /** Whether `instance` was created by this pool. */
  owns(instance: object): instance is T {
    return this.owned.has(instance)
  }

  stats(): PoolStats {
    return { idle: this.idle.length, created: this.created }
  }

  private make(): T {
    const instance = this.create()
    this.owned.add(instance)
    this.created++
    return instance
  }
}
