// C0 controls except tab, newline and carriage return, plus DEL.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/** Strip non-printable control characters from user input. */
export function sanitizePrompt(input: string): string {
  return input.replace(CONTROL_CHARS, "");
}
