/**
 * Let stdout and stderr drain before the process exits, so piped output is
 * not cut short.
 */
export async function gracefulExit(code?: number): Promise<void> {
  const finalCode =
    typeof code === "number"
      ? code
      : typeof process.exitCode === "number"
        ? process.exitCode
        : 0;

  await Promise.all([flush(process.stdout), flush(process.stderr)]);
  process.exit(finalCode);
}

function flush(stream: NodeJS.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (!stream.writableNeedDrain) {
      resolve();
      return;
    }
    stream.once("drain", () => resolve());
  });
}
