/*
Purpose: turn a failed command into stderr text and a process exit status.
Assumptions: color only on a TTY; --debug adds code, cause and stack lines.
Usage:
  console.error(renderCliError(err, { debug }));
  process.exitCode = cliExitCode(err);
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES, type UserFacingErrorCode } from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// sysexits(3) values where one fits.
const EXIT_CODES: Record<UserFacingErrorCode, number> = {
  [USER_FACING_ERROR_CODES.config]: 78,
  [USER_FACING_ERROR_CODES.git]: 1,
  [USER_FACING_ERROR_CODES.build]: 1,
  [USER_FACING_ERROR_CODES.store]: 74,
  [USER_FACING_ERROR_CODES.lock]: 75,
  [USER_FACING_ERROR_CODES.unknown]: 1,
};

type LineStyle = {
  label: string | null;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { label: null, labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function cliExitCode(error: unknown): number {
  return error instanceof UserFacingError ? EXIT_CODES[error.code] : 1;
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (style.label === null) return line.text;

  const label = format(style.label, style.labelStyles);
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${label}\n${format(indented, style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}
