import { isReportFormat, REPORT_FORMATS, type ReportFormat } from '@/types/report';
import { parsePositiveInt } from '@/utils/config';

export interface CliOptions {
  url: string;
  /** Folder to list; undefined lists the archive root */
  tree?: string;
  report?: ReportFormat;
  combine: boolean;
  output?: string;
  shardSize?: number;
  step?: number;
  maxAttempts?: number;
  verbose: boolean;
  help: boolean;
}

export class CliParser {
  static parse(args: string[]): CliOptions {
    const options: CliOptions = {
      url: '',
      combine: false,
      verbose: false,
      help: false,
    };

    const requireValue = (flag: string, index: number): string => {
      const value = args[index];
      if (value === undefined) {
        throw new Error(`Option ${flag} requires a value`);
      }
      return value;
    };

    const requireCount = (flag: string, index: number): number => {
      const value = requireValue(flag, index);
      if (value.trim() === '') {
        throw new Error(`Option ${flag} requires a value`);
      }
      return parsePositiveInt(flag, value, 0);
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '-h' || arg === '--help') {
        options.help = true;
      } else if (arg === '-t' || arg === '--tree') {
        // Optional value; a bare word before the URL is the URL itself
        const next = args[i + 1];
        const takesValue = next !== undefined && !next.startsWith('-') && options.url !== '';
        options.tree = takesValue ? next : '';
        if (takesValue) i++;
      } else if (arg === '-r' || arg === '--report') {
        const format = requireValue(arg, ++i);
        if (!isReportFormat(format)) {
          throw new Error(`Invalid report format: ${format}. Use ${REPORT_FORMATS.join(' or ')}.`);
        }
        options.report = format;
      } else if (arg === '-c' || arg === '--combine') {
        options.combine = true;
      } else if (arg === '-o' || arg === '--output') {
        options.output = requireValue(arg, ++i);
      } else if (arg === '--shard-size') {
        options.shardSize = requireCount(arg, ++i);
      } else if (arg === '--step') {
        options.step = requireCount(arg, ++i);
      } else if (arg === '--max-attempts') {
        options.maxAttempts = requireCount(arg, ++i);
      } else if (arg === '-v' || arg === '--verbose') {
        options.verbose = true;
      } else if (arg !== undefined && arg.startsWith('-')) {
        throw new Error(`Unknown option: ${arg}`);
      } else if (arg !== undefined) {
        if (options.url !== '') {
          throw new Error(`Unexpected argument: ${arg}`);
        }
        options.url = arg;
      }
    }

    if (options.combine && !options.report) {
      throw new Error('--combine requires --report <text|csv>');
    }
    if (!options.help && options.url === '') {
      throw new Error('No archive URL specified');
    }

    return options;
  }

  static printHelp(): void {
    console.log(`
Remote ZIP inspector

Usage:
  remote-zip-inspect <url> [options]

Lists the files and sizes of a remote ZIP archive using HTTP range
requests, without downloading the whole archive.

Options:
  -t, --tree [path]        List one folder of the archive (default: root)
  -r, --report <format>    Write size report shards (text or csv)
  -c, --combine            Merge the shards into one numbered report and delete them
  -o, --output <dir>       Report directory (default: reports)
  --shard-size <n>         Entries per report shard (default: 1000)
  --step <bytes>           Bytes added per central directory probe (default: 1048576)
  --max-attempts <n>       Maximum central directory probes (default: 20)
  -v, --verbose            Debug logging
  -h, --help               Show this help message

Examples:
  remote-zip-inspect https://example.com/data.zip
  remote-zip-inspect https://example.com/data.zip --tree images/2024
  remote-zip-inspect https://example.com/data.zip --report csv --combine -o ./out
`);
  }
}
