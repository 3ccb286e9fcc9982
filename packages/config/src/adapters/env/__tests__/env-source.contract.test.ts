import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource (unprefixed)",
  make: async () => ({
    source: new EnvSource({ env: { LOG_LEVEL: "debug", SERVICE_NAME: undefined } }),
  }),
  expected: { LOG_LEVEL: "debug" },
})

describeConfigSourceContract({
  name: "EnvSource (prefixed)",
  make: async () => ({
    source: new EnvSource({
      prefix: "RANGECACHE_",
      env: { RANGECACHE_RANGE_SUM_CACHE_CAPACITY: "32", HOME: "/home/test" },
    }),
  }),
  expected: { RANGE_SUM_CACHE_CAPACITY: "32" },
})
