export type CliOptions = {
  text: string;
  year: number;
  preview: boolean;
};

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; help: boolean; message?: string };

export function usage(bin = "contrib-text"): string {
  return `
${bin} - write text into a GitHub contribution graph

Usage:
  ${bin} <text> <year> [--preview]

Arguments:
  text        Text to display in the contribution graph (a-z, 0-9)
  year        Year for the contributions (2000-2100)

Options:
  --preview   Preview the bitmap instead of creating commits
  --help      Show this message

Examples:
  ${bin} hello 2024 --preview
  ${bin} 2024 2024
`;
}

/** argv: process.argv.slice(2) 형태 (노드/스크립트 경로 제외) */
export function parseArgs(argv: string[]): ParseResult {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { ok: false, help: true };
  }

  const flags = argv.filter((a) => a.startsWith("--"));
  const positionals = argv.filter((a) => !a.startsWith("--"));

  const unknown = flags.filter((f) => f !== "--preview");
  if (unknown.length > 0) {
    return { ok: false, help: false, message: `Unknown option: ${unknown[0]}` };
  }

  const [text, yearArg, ...extra] = positionals;
  if (text === undefined || yearArg === undefined) {
    return { ok: false, help: false, message: "Missing required arguments: text, year" };
  }
  if (extra.length > 0) {
    return { ok: false, help: false, message: `Unexpected argument: ${extra[0]}` };
  }
  if (!/^-?\d+$/.test(yearArg)) {
    return { ok: false, help: false, message: `Invalid year: ${yearArg}` };
  }

  return {
    ok: true,
    options: {
      text,
      year: Number.parseInt(yearArg, 10),
      preview: flags.includes("--preview"),
    },
  };
}
