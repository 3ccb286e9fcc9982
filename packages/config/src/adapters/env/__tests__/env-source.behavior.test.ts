import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all variables when no prefix is given", async () => {
    const source = new EnvSource({
      env: { RANGE_SUM_CACHE_CAPACITY: "64", LOG_LEVEL: "debug" },
    })

    expect(source.name).toBe("env")
    expect(await source.load()).toEqual({
      RANGE_SUM_CACHE_CAPACITY: "64",
      LOG_LEVEL: "debug",
    })
  })

  it("filters and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "APP_",
      env: { APP_LOG_LEVEL: "warn", APP_SERVICE_NAME: "sums", PATH: "/usr/bin" },
    })

    expect(source.name).toBe("env:APP_")
    expect(await source.load()).toEqual({ LOG_LEVEL: "warn", SERVICE_NAME: "sums" })
  })

  it("uses the injected env instead of process.env", async () => {
    const result = await new EnvSource({ env: { CUSTOM: "injected" } }).load()

    expect(result).toEqual({ CUSTOM: "injected" })
  })
})
