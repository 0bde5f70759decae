import { InvalidArgumentError } from "commander";

export const parsePositiveCount = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }

  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }

  return parsed;
};

export const parsePattern = (value: string): RegExp => {
  try {
    return new RegExp(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`Expected a regular expression (${reason}).`);
  }
};
