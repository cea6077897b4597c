import { InvalidArgumentError } from "commander";
import type { SortOrder } from "@lineage/core";

const parsePositiveInteger = (value: string, label: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${label} must be a positive integer.`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`${label} must be a positive integer.`);
  }

  return parsed;
};

export const parseLineNumber = (value: string): number => parsePositiveInteger(value, "line");

export const parseCommitLimit = (value: string): number => parsePositiveInteger(value, "limit");

export const collectValues = (value: string, previous: string[]): string[] => [...previous, value];

export const resolveSortOrder = (sort: SortOrder, reverse: boolean | undefined): SortOrder =>
  reverse === true ? "desc" : sort;
