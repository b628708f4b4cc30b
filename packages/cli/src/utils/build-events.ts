import {
  type Artifact,
  type BuildEvent,
  buildFinishedSchema,
  compilerArtifactSchema,
  otherEventSchema,
} from "../types.js";
import { ProtocolViolationError, ToolchainFailureError } from "./errors.js";

export interface BuildEventsResult {
  /** Whether a successful `build-finished` record was seen */
  finished: boolean;
  artifact?: Artifact;
}

export function parseBuildEvent(line: string): BuildEvent {
  let value: unknown;

  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new ProtocolViolationError(`Toolchain wrote a non-JSON line: ${line}`, {
      cause: error,
    });
  }

  const record = otherEventSchema.safeParse(value);
  if (!record.success) {
    throw new ProtocolViolationError(`Toolchain record has no reason: ${line}`);
  }

  switch (record.data.reason) {
    case "compiler-artifact": {
      const result = compilerArtifactSchema.safeParse(value);
      if (!result.success) {
        throw new ProtocolViolationError(
          `Invalid compiler-artifact record: ${result.error.message}`,
        );
      }
      return {
        reason: "compiler-artifact",
        packageId: result.data.package_id,
        executable: result.data.executable ?? null,
      };
    }
    case "build-finished": {
      const result = buildFinishedSchema.safeParse(value);
      if (!result.success) {
        throw new ProtocolViolationError(
          `Invalid build-finished record: ${result.error.message}`,
        );
      }
      return { reason: "build-finished", success: result.data.success };
    }
    default:
      return { reason: "other", kind: record.data.reason };
  }
}

/**
 * Reads `--message-format json` output one line at a time and keeps the last
 * executable produced by `packageId`. Stops at the first successful
 * `build-finished`; the rest of the stream is left unread.
 */
export async function consumeBuildEvents(
  lines: AsyncIterable<string>,
  packageId: string,
): Promise<BuildEventsResult> {
  let artifact: Artifact | undefined;

  for await (const line of lines) {
    const event = parseBuildEvent(line);

    switch (event.reason) {
      case "build-finished":
        if (!event.success) {
          throw new ToolchainFailureError("Toolchain reported a failed build");
        }
        return { finished: true, artifact };
      case "compiler-artifact":
        // Library targets of the same package have no executable.
        if (event.packageId === packageId && event.executable !== null) {
          artifact = { packageId: event.packageId, executable: event.executable };
        }
        break;
      case "other":
        break;
    }
  }

  return { finished: false, artifact };
}
