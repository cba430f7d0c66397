import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("is named after its label", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "test").name).toBe("object:test")
  })

  it("returns non-string values unchanged", async () => {
    const source = new ObjectSource({ MAX_RETRIES: 5, STRONG_CONSISTENCY: true })

    expect(await source.load()).toEqual({ MAX_RETRIES: 5, STRONG_CONSISTENCY: true })
  })
})
