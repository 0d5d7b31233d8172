import { parseArgs } from "node:util";

export type Command =
  | { readonly name: "sync"; readonly maxItems: number | undefined }
  | { readonly name: "serve" };

export function parseCommand(argv: ReadonlyArray<string>): Command {
  const { positionals, values } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      "max-items": { type: "string" },
    },
  });

  const name = positionals[0] ?? "sync";
  if (name === "serve") return { name };
  if (name !== "sync") {
    throw new Error(`unknown command "${name}" (expected "sync" or "serve")`);
  }

  const raw = values["max-items"];
  if (raw === undefined) return { name, maxItems: undefined };

  const maxItems = Number(raw);
  if (!Number.isInteger(maxItems) || maxItems <= 0) {
    throw new Error(`--max-items must be a positive integer, got "${raw}"`);
  }
  return { name, maxItems };
}
