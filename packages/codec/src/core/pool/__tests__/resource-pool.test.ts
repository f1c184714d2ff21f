import { PoolError } from "../../codec-errors"
import { ResourcePool } from "../resource-pool"

describe("ResourcePool", () => {
  let pool: ResourcePool<{ id: number }>
  let next: number

  beforeEach(() => {
    next = 0
    pool = new ResourcePool("things", () => ({ id: ++next }))
  })

  it("creates on demand and hands back released instances", () => {
    const a = pool.acquire()
    pool.release(a)

    expect(pool.acquire()).toBe(a)
    expect(pool.stats()).toEqual({ idle: 0, created: 1 })
  })

  it("never hands one instance to two holders", () => {
    const a = pool.acquire()
    const b = pool.acquire()

    expect(a).not.toBe(b)
    expect(pool.stats()).toEqual({ idle: 0, created: 2 })
  })

  it("knows which instances it created", () => {
    const a = pool.acquire()

    expect(pool.owns(a)).toBe(true)
    expect(pool.owns({ id: 99 })).toBe(false)
  })

  it("rejects foreign instances", () => {
    expect(() => pool.release({ id: 99 })).toThrow(
      new PoolError("things: instance was not handed out by this pool", { code: "foreign_coder" }),
    )
  })

  it("rejects releasing twice", () => {
    const a = pool.acquire()
    pool.release(a)

    expect(() => pool.release(a)).toThrow("things: instance released twice")
    expect(pool.stats().idle).toBe(1)
  })
})
