import { fileURLToPath } from "node:url"
import { defineConfig, defineProject } from "vitest/config"

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src`, import.meta.url))

const alias = {
  "@todo-probe/client": packageSource(`client`),
  "@todo-probe/contract-tests": packageSource(`contract-tests`),
  "@todo-probe/harness": packageSource(`harness`),
  "@todo-probe/load-tests": packageSource(`load-tests`),
  "@todo-probe/notifications": packageSource(`notifications`),
  "@todo-probe/promises": packageSource(`promises`),
  "@todo-probe/server": packageSource(`server`),
}

const project = (name: string) =>
  defineProject({
    test: {
      name,
      include: [`packages/${name}/**/*.test.ts`],
    },
    resolve: { alias },
  })

export default defineConfig({
  test: {
    projects: [
      project(`client`),
      project(`promises`),
      project(`notifications`),
      project(`harness`),
      project(`server`),
      project(`contract-tests`),
    ],
    coverage: {
      provider: `v8`,
      reporter: [`text`, `json`, `html`],
    },
  },
})
