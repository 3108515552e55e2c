export type ProcessOutput = {
  stdout: string;
  stderr: string;
  message: string;
};

export function outputText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

// execa rejects with an Error carrying stdout/stderr; anything else is stringified.
export function resolveExecaErrorOutput(err: unknown): ProcessOutput {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err) };
  }

  const stdout = "stdout" in err ? outputText(err.stdout) : "";
  const stderr = "stderr" in err ? outputText(err.stderr) : "";
  const message = err instanceof Error ? err.message : String(err);

  return { stdout, stderr, message };
}
