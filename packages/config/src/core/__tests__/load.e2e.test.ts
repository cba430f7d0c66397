import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  LOCK_TTL_MS: z.coerce.number().int().positive().default(3000),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(50),
  STRONG_CONSISTENCY: z.stringbool().default(false),
})

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "herdguard-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("applies schema defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    expect(config.value).toEqual({
      LOCK_TTL_MS: 3000,
      MAX_RETRIES: 50,
      STRONG_CONSISTENCY: false,
    })
    expect(config.explain("LOCK_TTL_MS")).toBe("default")
    expect(config.sourcesUsed()).toEqual([])
  })

  it("coerces env strings", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({
          env: { HERDGUARD_LOCK_TTL_MS: "5000", HERDGUARD_STRONG_CONSISTENCY: "true" },
          prefix: "HERDGUARD_",
        }),
      ],
    })

    expect(config.get("LOCK_TTL_MS")).toBe(5000)
    expect(config.get("STRONG_CONSISTENCY")).toBe(true)
  })

  it("layers dotenv < env < overrides, later wins", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "LOCK_TTL_MS=1000\nMAX_RETRIES=5\n")

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { MAX_RETRIES: "7", STRONG_CONSISTENCY: "false" } }),
        new ObjectSource({ STRONG_CONSISTENCY: "true" }),
      ],
    })

    expect(config.value).toEqual({
      LOCK_TTL_MS: 1000,
      MAX_RETRIES: 7,
      STRONG_CONSISTENCY: true,
    })
    expect(config.explain("LOCK_TTL_MS")).toBe("dotenv:.env")
    expect(config.explain("MAX_RETRIES")).toBe("env")
    expect(config.explain("STRONG_CONSISTENCY")).toBe("object:overrides")
  })

  it("undefined values do not override defined ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { MAX_RETRIES: "3" } }),
        new EnvSource({ env: { MAX_RETRIES: undefined } }),
      ],
    })

    expect(config.get("MAX_RETRIES")).toBe(3)
  })

  it("skips a missing optional dotenv file", async () => {
    const config = await loadConfig({
      schema,
      sources: [new DotenvSource({ file: ".env.missing", required: false, cwd })],
    })

    expect(config.get("MAX_RETRIES")).toBe(50)
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAX_RETRIES: "1", LOCK_TTL: "3s" } })],
    })

    expect(config.unknownKeys()).toEqual(["LOCK_TTL"])
  })

  it("throws ConfigValidationError on invalid values", async () => {
    const load = loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAX_RETRIES: "-1" } })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["env"] },
    })
  })
})
