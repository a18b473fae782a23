import * as path from "node:path"
import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

import config from "../../vitest.shared.ts"

export default defineConfig({
  root: path.dirname(fileURLToPath(import.meta.url)),
  test: {
    ...(config.test ?? {}),
    name: "flatbuffers",
    include: ["test/**/*.test.ts"],
    environment: "node"
  }
})
