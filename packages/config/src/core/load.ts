import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order, later wins. Defaults to the whole of `process.env`. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      z.prettifyError(result.error),
      sources.map((s) => s.name),
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
