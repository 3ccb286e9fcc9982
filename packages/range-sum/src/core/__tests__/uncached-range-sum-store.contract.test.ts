import { UncachedRangeSumStore } from "../uncached-range-sum-store"
import { runRangeSumQueriesContractTests } from "./range-sum-queries.contract"

describe("UncachedRangeSumStore", () => {
  runRangeSumQueriesContractTests(
    "UncachedRangeSumStore",
    (values) => new UncachedRangeSumStore(values),
  )
})
