import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ RANGE_SUM_CACHE_CAPACITY: "16" }, "cli"),
  }),
  expected: { RANGE_SUM_CACHE_CAPACITY: "16" },
})

describe("ObjectSource naming", () => {
  it("defaults to object:overrides", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
  })

  it("uses the provided name", () => {
    expect(new ObjectSource({}, "tests").name).toBe("object:tests")
  })
})
