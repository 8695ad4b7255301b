import { parseArgs } from "node:util";

export type CliCommand =
  | {
      kind: "convert";
      pdfPath: string;
      /** Write Markdown here instead of stdout. */
      output?: string;
      /** Save Markdown beside the PDF as `<stem>.md`. */
      save: boolean;
      html?: string;
      copy: boolean;
      open: boolean;
      apiKey?: string;
    }
  | { kind: "save-key"; apiKey: string }
  | { kind: "config-path" }
  | { kind: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: "string", short: "o" },
        save: { type: "boolean" },
        html: { type: "string" },
        copy: { type: "boolean" },
        open: { type: "boolean" },
        "api-key": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    // node:util reports unknown options and missing values as TypeErrors.
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parse(argv);
  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === "help") return { kind: "help" };

  switch (command) {
    case "convert": {
      if (rest.length !== 1) throw new UsageError("convert takes exactly one PDF path");
      if (values.output !== undefined && values.save) {
        throw new UsageError("--output and --save are mutually exclusive");
      }
      return {
        kind: "convert",
        pdfPath: rest[0],
        output: values.output,
        save: values.save ?? false,
        html: values.html,
        copy: values.copy ?? false,
        open: values.open ?? false,
        apiKey: values["api-key"],
      };
    }
    case "save-key": {
      const apiKey = rest[0] ?? values["api-key"];
      if (!apiKey || rest.length > 1) throw new UsageError("save-key takes exactly one key");
      return { kind: "save-key", apiKey };
    }
    case "config-path":
      return { kind: "config-path" };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
