import { flushAsync } from "@weft-tui/testkit";
import { type TestBackend, createTestBackend } from "../../testing/testBackend.js";
import type { VNode } from "../../vnode.js";
import { createApp } from "../createApp.js";
import type { App, AppConfig } from "../types.js";

export type StartedApp = Readonly<{ app: App; backend: TestBackend }>;

/** Create and start an app on a fresh test backend, then wait for the first idle. */
export async function startApp(root: VNode, config?: AppConfig): Promise<StartedApp> {
  const backend = createTestBackend();
  const app = createApp({ backend, root, config: { onWarning: () => {}, ...config } });
  await app.start();
  await settle(app);
  return { app, backend };
}

/** Let pending polls and async work reach the inbox, then wait for idle. */
export async function settle(app: App): Promise<void> {
  await flushAsync();
  await app.whenIdle();
}
