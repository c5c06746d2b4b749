// Process entry point. Like NodeRuntime.runMain, except that Ctrl+C is left
// to a running watch, which stops and hands control back to its caller.

import { Runtime } from "@effect/platform";
import process from "node:process";
import { watchHoldsInterrupt } from "./watch.ts";

export const runMain: Runtime.RunMain = Runtime.makeRunMain(({ fiber, teardown }) => {
  let receivedSignal = false;

  const interrupt = () => {
    receivedSignal = true;
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", interrupt);
    fiber.unsafeInterruptAsFork(fiber.id());
  };

  const onSigint = () => {
    if (!watchHoldsInterrupt()) interrupt();
  };

  fiber.addObserver((exit) => {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", interrupt);
    teardown(exit, (code) => {
      if (receivedSignal || code !== 0) process.exit(code);
    });
  });

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", interrupt);
});
