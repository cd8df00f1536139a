// Thread entry for ThreadHost tests: calls that block the thread synchronously.

import { serveInThread } from "../bridge/index.ts";
import { blockFor } from "../test-utils.ts";

serveInThread((method, args) => {
  switch (method) {
    case "echo":
      return args;
    case "block": {
      const ms = Number(args[0]);
      blockFor(ms);
      return `blocked ${ms}ms`;
    }
    case "fail":
      throw Object.assign(new Error(`refused: ${String(args[0])}`), {
        name: "RefusedError",
        code: "E_REFUSED",
      });
    case "exit":
      process.exit(3);
    default:
      throw new Error(`unknown method: ${method}`);
  }
});
