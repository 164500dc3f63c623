import type { Logger } from "~shared/Logger";

import { ExifExtractor } from "./ExifExtractor";
import type { Extractor } from "./Extractor";
import { FilenameExtractor } from "./FilenameExtractor";
import type { FilenamePattern } from "./FilenamePattern";
import { SidecarJsonExtractor } from "./SidecarJsonExtractor";

export * from "./ExifExtractor";
export * from "./Extractor";
export * from "./FilenameExtractor";
export * from "./FilenamePattern";
export * from "./SidecarJsonExtractor";

/** exif、json、filename 三種內建策略 */
export function buildDefaultExtractors(deps: {
  logger: Logger;
  nameFormats: readonly FilenamePattern[];
}): Extractor[] {
  return [
    new ExifExtractor({ logger: deps.logger }),
    new SidecarJsonExtractor(),
    new FilenameExtractor(deps.nameFormats),
  ];
}
