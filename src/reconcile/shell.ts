const SAFE_WORD = /^[A-Za-z0-9@%+=:,./_-]+$/;

/** Single-quote `value` for bash unless it is made only of characters bash leaves alone. */
export function shellQuote(value: string): string {
  if (value !== "" && SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(" ");
}

/**
 * `cat > path` fed by a quoted here-document, so nothing in `lines` is
 * expanded. The delimiter is chosen so it cannot collide with a line.
 */
export function heredocWrite(path: string, lines: readonly string[]): string {
  let delimiter = "DEVBOX_EOF";
  while (lines.includes(delimiter)) delimiter += "_";
  return `cat > ${shellQuote(path)} <<'${delimiter}'\n${lines.join("\n")}\n${delimiter}`;
}
