import { Command } from 'commander';

export interface CliOptions {
  configFile?: string;
  verify?: boolean;
}

const LEGACY_CONFIG_FLAG = '-configFile';

// The single-dash `-configFile` spelling would otherwise parse as `-c onfigFile`.
function normalizeArgs(args: readonly string[]): string[] {
  return args.map((arg) => {
    if (arg === LEGACY_CONFIG_FLAG) return '--configFile';
    if (arg.startsWith(`${LEGACY_CONFIG_FLAG}=`)) return `-${arg}`;
    return arg;
  });
}

function createProgram(): Command {
  return new Command()
    .name('contact-dispatch')
    .description('Renders contact-form submissions and mails them to a fixed set of recipients')
    .option('-c, --config-file <path>', 'config file path')
    .option('--configFile <path>', 'config file path (alias of --config-file)')
    .option('--verify', 'check SMTP connectivity and credentials before serving');
}

/** Parses process-style argv (`node script ...flags`). */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const [runtime = 'node', script = 'contact-dispatch', ...args] = argv;
  const program = createProgram().parse([runtime, script, ...normalizeArgs(args)]);
  return program.opts<CliOptions>();
}
