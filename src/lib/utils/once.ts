/**
 * A get-or-compute-once cell. The first caller's computation is shared by everyone who asks while
 * it is in flight; a failed computation leaves the cell empty.
 */
export class Once<T> {
  private value?: Promise<T>

  get(compute: () => Promise<T>): Promise<T> {
    if (this.value) return this.value
    const pending = compute()
    this.value = pending
    pending.catch(() => {
      if (this.value === pending) this.value = undefined
    })
    return pending
  }

  get isSet(): boolean {
    return this.value !== undefined
  }
}
