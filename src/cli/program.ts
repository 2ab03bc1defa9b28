import { readFileSync } from "fs";
import { resolve } from "path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import {
  DEFAULT_ENV_FILE,
  describeSettings,
  loadSettings,
  requireApiKey,
  writeSettingsTemplate,
} from "../lib/config.js";
import { ConfigurationError, getErrorMessage, isAppError } from "../lib/errors.js";
import { ContentGenerator, OpenAIBackend, type CompletionBackend } from "../lib/generator.js";
import logger from "../lib/logger.js";
import { runPipeline, writeDocument } from "../lib/pipeline.js";
import { createMcpConnector, type ResearchConnector } from "../lib/research.js";
import { LENGTHS, MAX_IMAGE_COUNT, TONES, type Length, type Settings, type Tone } from "../lib/types.js";
import { UnsplashClient, type ImageSource } from "../lib/unsplash.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));

export const VERSION =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

/** Seams for swapping the external collaborators, used by the tests. */
export interface CliDeps {
  createBackend?: (settings: Settings) => CompletionBackend;
  createImageSource?: (settings: Settings) => ImageSource | undefined;
  createResearchConnector?: (settings: Settings) => ResearchConnector;
  now?: () => Date;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

interface GenerateOptions {
  output?: string;
  language?: string;
  tone?: Tone;
  length?: Length;
  research?: boolean;
  author?: string;
  images?: number;
  model?: string;
  temperature?: number;
  imageQuery?: string[];
  env?: string;
}

function parseTopic(value: string): string {
  const topic = value.trim();
  if (!topic) {
    throw new InvalidArgumentError("Topic must not be empty.");
  }
  return topic;
}

function parseImageCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0 || count > MAX_IMAGE_COUNT) {
    throw new InvalidArgumentError(`Must be an integer between 0 and ${MAX_IMAGE_COUNT}.`);
  }
  return count;
}

function parseTemperature(value: string): number {
  const temperature = Number(value);
  if (Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
    throw new InvalidArgumentError("Must be a number between 0 and 2.");
  }
  return temperature;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function defaultImageSource(settings: Settings): ImageSource | undefined {
  if (!settings.unsplash.accessKey) return undefined;
  return new UnsplashClient({
    accessKey: settings.unsplash.accessKey,
    timeoutMs: settings.requestTimeoutMs,
  });
}

export function createProgram(deps: CliDeps = {}): Command {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const program = new Command();

  program
    .name("autoblog")
    .description("Generate SEO-ready blog posts with an OpenAI-compatible model")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text),
      writeErr: (text) => (deps.stderr ?? ((t: string) => process.stderr.write(t)))(text),
    });

  program
    .command("init")
    .description("Write a settings file template")
    .option("-p, --path <file>", "Settings file to create", DEFAULT_ENV_FILE)
    .option("-f, --force", "Overwrite an existing settings file", false)
    .action((options: { path: string; force: boolean }) => {
      const path = resolve(options.path);
      if (!writeSettingsTemplate(path, { force: options.force })) {
        logger.warn(`${options.path} already exists. Use --force to overwrite it.`);
        return;
      }
      logger.success(`Configuration file created: ${options.path}`);
      logger.info("Edit it and add your OpenAI API key.");
    });

  program
    .command("generate")
    .description("Generate a blog post with SEO front matter")
    .argument("<topic>", "Blog post topic or title", parseTopic)
    .option("-o, --output <file>", "Output file path (default: stdout)")
    .option("-l, --language <language>", "Language of the post (default: DEFAULT_LANGUAGE)")
    .addOption(new Option("-t, --tone <tone>", "Tone of the post").choices(TONES))
    .addOption(new Option("--length <length>", "Length of the post").choices(LENGTHS))
    .option("-r, --research", "Gather reference material from MCP servers", false)
    .option("-a, --author <author>", "Author name for the front matter")
    .option("-i, --images <count>", `Number of Unsplash images (0-${MAX_IMAGE_COUNT})`, parseImageCount)
    .option("-m, --model <model>", "Model name (default: DEFAULT_MODEL)")
    .option("--temperature <value>", "Sampling temperature (0-2)", parseTemperature)
    .option("--image-query <keywords>", "Comma-separated image search keywords", parseList)
    .option("--env <file>", "Settings file to load")
    .action(async (topic: string, options: GenerateOptions) => {
      const settings = loadSettings({ envPath: options.env });
      const apiKey = requireApiKey(settings);

      const request = {
        topic,
        language: options.language ?? settings.defaultLanguage,
        tone: options.tone ?? settings.defaultTone,
        length: options.length ?? settings.defaultLength,
        author: options.author ?? settings.author,
        research: options.research ?? false,
        imageCount: options.images ?? settings.imageCount,
        imageQuery: options.imageQuery,
        model: options.model ?? settings.model,
        temperature: options.temperature ?? settings.temperature,
      };

      logger.header("Blog Post Generator");
      logger.label("Topic", topic);
      logger.label("Language", request.language);
      logger.label("Tone", request.tone);
      logger.label("Length", request.length);
      logger.label("Author", request.author);
      logger.label("Images", request.imageCount);
      if (request.research) {
        logger.label("Research", `${settings.mcpServers.length} MCP server(s)`);
      }
      logger.divider();

      const backend =
        deps.createBackend?.(settings) ??
        new OpenAIBackend({
          apiKey,
          baseURL: settings.openaiApiBase,
          timeoutMs: settings.requestTimeoutMs,
        });

      const result = await runPipeline(request, {
        settings,
        generator: new ContentGenerator(backend),
        connectResearch:
          deps.createResearchConnector?.(settings) ??
          createMcpConnector({ timeoutMs: settings.requestTimeoutMs }),
        images: deps.createImageSource ? deps.createImageSource(settings) : defaultImageSource(settings),
        now: deps.now,
      });

      if (options.output) {
        await writeDocument(resolve(options.output), result.markdown);
        logger.success(`Blog post saved to: ${options.output}`);
      } else {
        stdout(result.markdown);
      }
    });

  program
    .command("config")
    .description("Show the effective settings (secrets masked)")
    .option("--env <file>", "Settings file to load")
    .option("--json", "Output as JSON", false)
    .action((options: { env?: string; json: boolean }) => {
      const settings = loadSettings({ envPath: options.env });
      const view = describeSettings(settings);

      if (options.json) {
        stdout(`${JSON.stringify(view, null, 2)}\n`);
        return;
      }
      logger.header("Configuration");
      for (const [key, value] of Object.entries(view)) {
        logger.label(key, value);
      }
    });

  program
    .command("version")
    .description("Show version information")
    .action(() => {
      stdout(`autoblog version ${VERSION}\n`);
    });

  return program;
}

export function reportError(error: unknown): void {
  logger.error(getErrorMessage(error));
  if (error instanceof ConfigurationError) {
    logger.info(`Run ${chalk.cyan("autoblog init")} to create a settings file.`);
  } else if (isAppError(error) && error.context && process.env.DEBUG) {
    logger.debug(JSON.stringify(error.context));
  }
}

/**
 * Parse and run. Resolves to the process exit code instead of exiting.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    reportError(error);
    return 1;
  }
}
