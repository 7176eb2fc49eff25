/**
 * Base class for CLI commands
 */

export type OptionValue = string | boolean;

export interface ParsedArgs {
  positional: string[];
  options: { [name: string]: OptionValue };
}

export abstract class Command {
  readonly name: string;
  readonly description: string;

  constructor(name: string, description: string) {
    this.name = name;
    this.description = description;
  }

  abstract execute(args: string[]): Promise<void>;

  abstract showHelp(): void;

  /**
   * Split arguments into positionals and options.
   *
   * `--name value` and `--name=value` set a string; a bare `--flag` or
   * `-f` sets true; `--no-flag` sets false.
   */
  protected parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const options: { [name: string]: OptionValue } = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg.startsWith('--')) {
        const body = arg.slice(2);
        const eq = body.indexOf('=');
        if (eq !== -1) {
          options[body.slice(0, eq)] = body.slice(eq + 1);
        } else if (body.startsWith('no-')) {
          options[body.slice(3)] = false;
        } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
          options[body] = args[++i];
        } else {
          options[body] = true;
        }
      } else if (arg.startsWith('-') && arg.length > 1) {
        options[arg.slice(1)] = true;
      } else {
        positional.push(arg);
      }
    }

    return { positional, options };
  }

  protected requireArg(positional: string[], index: number, name: string): string {
    const value = positional[index];
    if (value === undefined) {
      throw new Error(`Missing required argument: <${name}>`);
    }
    return value;
  }

  protected stringOption(options: ParsedArgs['options'], name: string): string | undefined {
    const value = options[name];
    return typeof value === 'string' ? value : undefined;
  }
}
