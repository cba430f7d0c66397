import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ STRONG_CONSISTENCY: true, MAX_RETRIES: 3 }, "test"),
    expected: { STRONG_CONSISTENCY: true, MAX_RETRIES: 3 },
  }),
})
