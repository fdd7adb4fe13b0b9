/**
 * String-keyed handler table for one capability (component resolving, action
 * handling, node rendering...). Registration is explicit; the last write per kind wins.
 */
export class Registry<THandler> {
  private readonly handlers = new Map<string, THandler>()

  constructor(entries?: Iterable<readonly [string, THandler]>) {
    if (entries) for (const [kind, handler] of entries) this.handlers.set(kind, handler)
  }

  register(kind: string, handler: THandler): this {
    this.handlers.set(kind, handler)
    return this
  }

  unregister(kind: string): void {
    this.handlers.delete(kind)
  }

  get(kind: string): THandler | undefined {
    return this.handlers.get(kind)
  }

  has(kind: string): boolean {
    return this.handlers.has(kind)
  }

  kinds(): string[] {
    return Array.from(this.handlers.keys()).sort()
  }

  /** Copy of this registry with `other`'s entries layered on top. */
  merging(other: Registry<THandler>): Registry<THandler> {
    return new Registry<THandler>([...this.handlers, ...other.handlers])
  }
}
