import * as path from "node:path"
import { fileURLToPath } from "node:url"

import type { ViteUserConfig } from "vitest/config"

const rootDirectory = path.dirname(fileURLToPath(import.meta.url))

const alias = (dir: string, name = `@flatwire/${dir}`) => ({
  [`${name}/test`]: path.join(rootDirectory, "packages", dir, "test"),
  [`${name}`]: path.join(rootDirectory, "packages", dir, "src")
})

const config: ViteUserConfig = {
  test: {
    alias: {
      ...alias("flatbuffers"),
      ...alias("cli")
    },
    watch: false,
    globals: true,
    environment: "node",
    include: ["test/**/*.{test,spec}.{js,mjs,cjs,ts,mts,cts,jsx,tsx}"],
    reporters: ["default"],
    coverage: {
      reportsDirectory: "./test-output/vitest/coverage",
      provider: "v8" as const
    }
  }
}

export default config
