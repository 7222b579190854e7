/**
 * recordlens inspect command - print the normalized bodies of a dump
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { methodSignature, printBody } from "@recordlens/core";
import type { Logger } from "../logger.js";
import type { CommandFailure, Result } from "../types.js";
import { loadDump } from "./load-dump.js";

const indent = (text: string): string =>
  text
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");

/**
 * One section per method with a body, in declaration order:
 *
 *   System.Int32 get_X()
 *     leave body (ldfld <X>k__BackingField(ldloc this))
 */
export const inspectCommand = async (
  dumpPath: string,
  logger: Logger,
  signal?: AbortSignal
): Promise<Result<string, CommandFailure>> => {
  const loaded = loadDump(dumpPath, logger);
  if (!loaded.ok) {
    return loaded;
  }
  const { record, bodies } = loaded.value;

  const sections: string[] = [];
  for (const method of record.methods) {
    await yieldToEventLoop();
    signal?.throwIfAborted();

    const body = bodies.get(method.token);
    if (!body) {
      logger.verbose(`Skipping ${method.name}: no body`);
      continue;
    }
    logger.verbose(
      `${method.name}: variables ${body.variables.map((v) => v.name).join(", ") || "(none)"}`
    );
    sections.push(`${methodSignature(method)}\n${indent(printBody(body))}`);
  }

  return { ok: true, value: sections.join("\n\n") };
};
