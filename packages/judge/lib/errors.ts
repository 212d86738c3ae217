/**
 * lib/errors.ts - Fatal input errors
 *
 * Thrown before any model call; the CLI maps them to exit code 2.
 */

export class MissingRubricError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Missing judge file: ${path}`);
    this.name = "MissingRubricError";
    this.path = path;
  }
}

export class MissingSamplesError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`sample.json not found at ${path}`);
    this.name = "MissingSamplesError";
    this.path = path;
  }
}

export class InvalidSamplesError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid samples file ${path}: ${detail}`);
    this.name = "InvalidSamplesError";
    this.path = path;
  }
}
