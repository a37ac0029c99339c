import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { ProbeMarker, ProbeReport } from "../core/types.js";

function describeMarker(marker: ProbeMarker): string {
  return marker.expect === "present" ? `${marker.path} (present)` : `${marker.path} ~ ${marker.expect.join(", ")}`;
}

async function markerFound(root: string, marker: ProbeMarker, logger: Logger): Promise<boolean> {
  const target = path.join(root, marker.path);
  const stat = await fs.stat(target).catch(() => null);
  if (!stat?.isFile()) return false;
  if (marker.expect === "present") return true;

  let content: string;
  try {
    content = await fs.readFile(target, "utf8");
  } catch (error) {
    logger.debug(`Could not read ${marker.path}: ${errorMessage(error)}`);
    return false;
  }

  const haystack = marker.caseInsensitive ? content.toLowerCase() : content;
  return marker.expect.every((needle) => haystack.includes(marker.caseInsensitive ? needle.toLowerCase() : needle));
}

/**
 * Smoke check over the transformed tree: one point per marker found. It cannot tell a correct
 * transformation from a textually plausible wrong one.
 */
export async function runVerificationProbe(
  root: string,
  markers: readonly ProbeMarker[],
  logger: Logger
): Promise<ProbeReport> {
  const matched: string[] = [];
  for (const marker of markers) {
    if (await markerFound(root, marker, logger)) {
      matched.push(describeMarker(marker));
      logger.debug(`Verified marker: ${describeMarker(marker)}`);
    }
  }

  logger.info(`Verified ${matched.length}/${markers.length} markers`);
  return {
    confidence: matched.length,
    total: markers.length,
    matched,
    passed: matched.length > 0
  };
}
