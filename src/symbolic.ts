/**
 * Symbolic values held in the walker's single working register.
 */

import { describeValue } from "./util/values";

export type SymbolicValue = Empty | Concrete | PartialName;

/** Nothing pending. */
export interface Empty {
  tag: "empty";
}

/** A resolved runtime value. */
export interface Concrete {
  tag: "concrete";
  value: unknown;
}

/** An unresolved dotted path, built from chained attribute names. */
export interface PartialName {
  tag: "partial";
  name: string;
}

/** A committed entry of a reference list. */
export type Reference = Concrete | PartialName;

/**
 * References in the order the walk committed them. Order decides fingerprint
 * byte order, so it is never sorted or deduplicated.
 */
export type ReferenceList = readonly Reference[];

// Constructors
export const empty: Empty = { tag: "empty" };
export const concrete = (value: unknown): Concrete => ({ tag: "concrete", value });
export const partialName = (name: string): PartialName => ({ tag: "partial", name });

export function isReference(value: SymbolicValue): value is Reference {
  return value.tag !== "empty";
}

/**
 * Extend a dotted path by one attribute name.
 */
export function chainName(base: string, attribute: string): string {
  return `${base}.${attribute}`;
}

/**
 * The plain view of a reference list: resolved values as themselves,
 * unresolved names as strings.
 */
export function referenceValues(references: ReferenceList): unknown[] {
  return references.map((reference) => (reference.tag === "concrete" ? reference.value : reference.name));
}

export function referenceToString(reference: Reference): string {
  if (reference.tag === "partial") return reference.name;
  return describeValue(reference.value);
}
