import { parseArgs } from "node:util";
import { z } from "zod";
import { fitVersion } from "./bitstream";
import type { Config } from "./config";
import { QrCodeError } from "./errors";
import type { Logger } from "./logger";
import { savePng } from "./png";
import { type EncodeStep, QrCode } from "./qrCode";
import { Ecc, type Version } from "./tables";
import { type TerminalOptions, renderTerminal } from "./terminal";

export type CliIo = Readonly<{
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}>;

export type CliDeps = Readonly<{
  io: CliIo;
  logger: Logger;
  config: Config;
}>;

export const USAGE = `Usage: qr [options] <text>

Options:
  --version <1|2|auto>   symbol version (default from QR_VERSION, else auto)
  --ecc <L|M|Q|H>        error correction level (default from QR_ECC, else M)
  --explain              print each encoding step
  --scale <1-3>          repeat each module this many times
  --frame                draw a border around the symbol (and a quiet zone in the PNG)
  --dark-char <chars>    characters for a dark module
  --light-char <chars>   characters for a light module
  --dark-colour <spec>   ANSI code, #rrggbb or colour name for dark modules
  --light-colour <spec>  ANSI code, #rrggbb or colour name for light modules
  --png <file>           also save the symbol as a PNG image
  --png-scale <px>       pixels per module in the PNG (default from QR_PNG_SCALE, else 10)`;

// Quiet zone drawn around the PNG with --frame, in modules.
const PNG_FRAME_MODULES = 4;

const CliOptionsSchema = z.object({
  version: z.enum(["1", "2", "auto"]).optional(),
  ecc: z
    .string()
    .regex(/^[LMQH]$/i, "expected L, M, Q or H")
    .optional(),
  explain: z.boolean().default(false),
  scale: z.coerce.number().int().min(1).max(3).default(1),
  frame: z.boolean().default(false),
  darkChar: z.string().min(1).optional(),
  lightChar: z.string().min(1).optional(),
  darkColour: z.string().min(1).optional(),
  lightColour: z.string().min(1).optional(),
  png: z.string().min(1).optional(),
  pngScale: z.coerce.number().int().positive().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

function parseCommandLine(argv: string[]): { text?: string; raw: Record<string, unknown> } {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      version: { type: "string" },
      ecc: { type: "string", short: "e" },
      explain: { type: "boolean" },
      scale: { type: "string", short: "s" },
      frame: { type: "boolean" },
      "dark-char": { type: "string" },
      "light-char": { type: "string" },
      "dark-colour": { type: "string" },
      "light-colour": { type: "string" },
      png: { type: "string" },
      "png-scale": { type: "string" },
    },
  });
  return {
    text: positionals.length ? positionals.join(" ") : undefined,
    raw: {
      version: values.version,
      ecc: values.ecc,
      explain: values.explain,
      scale: values.scale,
      frame: values.frame,
      darkChar: values["dark-char"],
      lightChar: values["light-char"],
      darkColour: values["dark-colour"],
      lightColour: values["light-colour"],
      png: values.png,
      pngScale: values["png-scale"],
    },
  };
}

// darkChar -> dark-char
function flagName(path: ReadonlyArray<string | number>): string {
  return path.join(".").replace(/[A-Z]/g, (c) => "-" + c.toLowerCase());
}

function resolveVersion(
  requested: CliOptions["version"],
  config: Config,
  text: string,
  ecc: Ecc
): Version {
  const choice = requested ?? config.version;
  if (choice === "auto") return fitVersion(text, ecc);
  return choice === "1" || choice === 1 ? 1 : 2;
}

// The detail printed under a step's message, if it has one.
function describeStep(step: EncodeStep, drawing: TerminalOptions): string | undefined {
  switch (step.kind) {
    case "bitstream":
      return step.bits;
    case "dataCodewords":
    case "errorCorrection":
    case "combined":
      return `[${step.codewords.join(", ")}]`;
    case "functionPatterns":
    case "dataPlacement":
    case "maskScored":
      return renderTerminal(step.modules, drawing);
    default:
      return undefined;
  }
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { io, logger, config } = deps;

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    io.stderr(`Error: ${err.message}`);
    io.stderr(USAGE);
    return 1;
  }

  if (parsed.text === undefined) {
    io.stderr(USAGE);
    return 2;
  }
  const text = parsed.text;

  const result = CliOptionsSchema.safeParse(parsed.raw);
  if (!result.success) {
    for (const issue of result.error.issues)
      io.stderr(`Error: --${flagName(issue.path)}: ${issue.message}`);
    return 1;
  }
  const options = result.data;

  try {
    const ecc = options.ecc === undefined ? config.ecc : Ecc.fromName(options.ecc);
    const version = resolveVersion(options.version, config, text, ecc);
    const qr = QrCode.encodeText(text, { version, ecc, explain: options.explain });
    logger.info({ version, ecc: ecc.name, mask: qr.mask, score: qr.penalty.total }, "encoded");

    const drawing: TerminalOptions = {
      dark: options.darkChar,
      light: options.lightChar,
      scale: options.scale,
      frame: options.frame,
      darkColour: options.darkColour,
      lightColour: options.lightColour,
    };

    qr.steps.forEach((step, i) => {
      logger.debug({ step: step.kind }, step.message);
      io.stdout(`Step ${i + 1}: ${step.message}`);
      const detail = describeStep(step, drawing);
      if (detail !== undefined) io.stdout(detail);
    });

    io.stdout(`Using version ${qr.version}-${qr.ecc.name}`);
    io.stdout(renderTerminal(qr.modules, drawing));
    io.stdout(`Best mask: ${qr.mask} (score ${qr.penalty.total})`);

    if (options.png !== undefined) {
      const info = await savePng(qr.modules, options.png, {
        scale: options.pngScale ?? config.pngScale,
        margin: options.frame ? PNG_FRAME_MODULES : 0,
        darkColour: options.darkColour,
        lightColour: options.lightColour,
      });
      logger.info({ file: options.png, width: info.width, height: info.height }, "saved png");
      io.stdout(`QR code saved as: ${options.png}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof QrCodeError) {
      logger.warn({ err }, "encoding failed");
      io.stderr(`Error: ${err.message}`);
      return 1;
    }
    if (err instanceof RangeError) {
      io.stderr(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
