import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
  InvalidArgumentError,
  describeError,
  loggerFactory,
} from "@helpmirror/catalog-sdk";
import { KNOWN_PRODUCTS } from "@helpmirror/catalog-service";
import { clearSelection, selectBooks } from "@helpmirror/offline-cache";
import {
  CLI_VERSION,
  loadSettings,
  resolveCacheDirectory,
  resolveLogDirectory,
  type MirrorSettings,
} from "./config/index.js";
import {
  formatBookTable,
  formatDownloadStatus,
  formatLocales,
  formatProducts,
  formatSyncResult,
} from "./reporting.js";
import {
  loadCachedCatalog,
  openMirrorSession,
  type MirrorSession,
  type SessionFactory,
} from "./session.js";

export interface CliDependencies {
  openSession: SessionFactory;
  loadSettings: (explicitPath: string | undefined, env: NodeJS.ProcessEnv) => Promise<MirrorSettings>;
  env: NodeJS.ProcessEnv;
  out: (line: string) => void;
  err: (line: string) => void;
}

export const defaultDependencies: CliDependencies = {
  openSession: openMirrorSession,
  loadSettings: (explicitPath, env) => loadSettings(explicitPath, env),
  env: process.env,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  logDir: z.string().optional(),
});

const ProductOptionsSchema = GlobalOptionsSchema.extend({
  product: z.string().min(1),
});

const CatalogOptionsSchema = ProductOptionsSchema.extend({
  locale: z.string().min(1),
  cache: z.string().optional(),
});

const SyncOptionsSchema = CatalogOptionsSchema.extend({
  book: z.array(z.string().min(1)).default([]),
  only: z.boolean().default(false),
});

type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

function readOptions<T extends z.ZodTypeAny>(schema: T, command: Command): z.infer<T> {
  const result = schema.safeParse(command.optsWithGlobals());
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError("options", `Invalid options: ${issues}`);
  }
  return result.data;
}

/**
 * Builds the `helpmirror` command tree. Every action reports failures as
 * `<action> failed - <reason>` and sets the exit code through `setExitCode`.
 */
export function createProgram(
  deps: CliDependencies,
  setExitCode: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name("helpmirror")
    .description("Mirror Visual Studio help content into a local cache")
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
    })
    .option("-c, --config <path>", "settings file (default: ./helpmirror.json)")
    .option("--log-dir <path>", "also write JSON-lines logs to this directory");

  const runAction = async (
    actionName: string,
    command: Command,
    body: (settings: MirrorSettings) => Promise<void>,
  ): Promise<void> => {
    try {
      const globals: GlobalOptions = readOptions(GlobalOptionsSchema, command);
      const settings = await deps.loadSettings(globals.config, deps.env);
      const logDirectory = resolveLogDirectory(settings, globals.logDir, deps.env);
      if (logDirectory) {
        loggerFactory.setLogDirectory(logDirectory);
      }
      await body(settings);
    } catch (error) {
      deps.err(`${actionName} failed - ${describeError(error)}`);
      setExitCode(1);
    }
  };

  const withSession = async (
    settings: MirrorSettings,
    body: (session: MirrorSession) => Promise<void>,
  ): Promise<void> => {
    const session = deps.openSession(settings);
    try {
      await body(session);
    } finally {
      await session.close();
    }
  };

  program
    .command("products")
    .description("list the known product versions")
    .action(() => {
      formatProducts(KNOWN_PRODUCTS).forEach((line) => deps.out(line));
    });

  program
    .command("locales")
    .description("list the locales of a product")
    .requiredOption("-p, --product <token>", "product version token, e.g. dev15")
    .action(async (_options: unknown, command: Command) => {
      await runAction("Locales update", command, async (settings) => {
        const options = readOptions(ProductOptionsSchema, command);
        await withSession(settings, async (session) => {
          const locales = await session.catalog.loadLocales(options.product);
          formatLocales(locales).forEach((line) => deps.out(line));
        });
      });
    });

  program
    .command("books")
    .description("list the books of a locale with their cache state")
    .requiredOption("-p, --product <token>", "product version token, e.g. dev15")
    .requiredOption("-l, --locale <code>", "locale code, e.g. en-us")
    .option("--cache <dir>", "cache directory")
    .action(async (_options: unknown, command: Command) => {
      await runAction("Books update", command, async (settings) => {
        const options = readOptions(CatalogOptionsSchema, command);
        const cacheDirectory = resolveCacheDirectory(settings, options.cache, deps.env);
        await withSession(settings, async (session) => {
          const bookGroups = await loadCachedCatalog(
            session,
            options.product,
            options.locale,
            cacheDirectory,
          );
          formatBookTable(bookGroups).forEach((line) => deps.out(line));
        });
      });
    });

  program
    .command("sync")
    .description("download the wanted books and rewrite the cache indexes")
    .requiredOption("-p, --product <token>", "product version token, e.g. dev15")
    .requiredOption("-l, --locale <code>", "locale code, e.g. en-us")
    .option("--cache <dir>", "cache directory")
    .option("-b, --book <name...>", "select books by name or id")
    .option("--only", "keep only the books given with --book")
    .action(async (_options: unknown, command: Command) => {
      await runAction("Download", command, async (settings) => {
        const options = readOptions(SyncOptionsSchema, command);
        const cacheDirectory = resolveCacheDirectory(settings, options.cache, deps.env);
        await withSession(settings, async (session) => {
          const bookGroups = await loadCachedCatalog(
            session,
            options.product,
            options.locale,
            cacheDirectory,
          );

          if (options.only) {
            clearSelection(bookGroups);
          }
          const unmatched = selectBooks(bookGroups, options.book);
          if (unmatched.length > 0) {
            throw new InvalidArgumentError("book", `No book matches: ${unmatched.join(", ")}`);
          }

          const result = await session.createEngine().syncBooks(bookGroups, cacheDirectory, {
            onProgress: (percent) => deps.out(`[${String(percent).padStart(3)}%] overall`),
            onDownloadStatus: (status) => deps.out(formatDownloadStatus(status)),
          });
          deps.out(formatSyncResult(result));
        });
      });
    });

  return program;
}

/**
 * Parses `argv` (user arguments only) and runs the chosen command.
 * Resolves to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = defaultDependencies,
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
