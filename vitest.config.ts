import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function workspaceEntry(path: string): string {
	return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
		testTimeout: 30000,
		hookTimeout: 30000,
	},
	resolve: {
		alias: {
			"threadwatch-core": workspaceEntry("./packages/core/src/index.ts"),
			"threadwatch-slack-monitor": workspaceEntry(
				"./packages/slack-monitor/src/index.ts",
			),
			"threadwatch-issue-trackers": workspaceEntry(
				"./packages/issue-trackers/src/index.ts",
			),
		},
	},
});
