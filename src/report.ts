/**
 * Text and JSON renderings of a reference list.
 */

import color from "cli-color";
import { ReferenceList, referenceToString } from "./symbolic";

export interface ReferenceRecord {
  kind: "object" | "name";
  text: string;
}

export interface RenderOptions {
  /** Highlight kinds for a terminal. */
  color?: boolean;
}

export function toRecords(references: ReferenceList): ReferenceRecord[] {
  return references.map((reference) => ({
    kind: reference.tag === "concrete" ? "object" : "name",
    text: referenceToString(reference),
  }));
}

/**
 * One reference per line: `object <description>` or `name <dotted.path>`.
 */
export function renderReferences(references: ReferenceList, options: RenderOptions = {}): string {
  return toRecords(references)
    .map((record) => {
      const label = record.kind.padEnd(6);
      if (!options.color) return `${label} ${record.text}`;
      return `${record.kind === "object" ? color.green(label) : color.yellow(label)} ${record.text}`;
    })
    .join("\n");
}

export function renderReferencesJson(references: ReferenceList): string {
  return JSON.stringify(toRecords(references), null, 2);
}
