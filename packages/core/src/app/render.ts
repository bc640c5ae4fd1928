import type { TerminalBackend } from "../backend.js";
import type { VNode } from "../vnode.js";
import { createApp } from "./createApp.js";
import type { AppConfig } from "./types.js";

export type RenderOptions = Readonly<{
  backend: TerminalBackend;
  config?: AppConfig;
}>;

/**
 * Run `root` until the app exits.
 *
 * Resolves on a clean exit (requestExit, closed input); rejects with the
 * fatal WeftError otherwise. The backend is stopped and disposed either way.
 */
export async function render(root: VNode, opts: RenderOptions): Promise<void> {
  const app = createApp({ backend: opts.backend, root, config: opts.config });
  try {
    await app.start();
    await app.waitForExit();
  } finally {
    app.dispose();
  }
}
