import { parseDocumentType, DOCUMENT_TYPES, type DocumentType } from '../../domain/documents/DocumentType.js';
import type { OutputFormat } from './types.js';

export interface CliArgs {
  folder?: string;
  documentType?: DocumentType;
  format?: OutputFormat;
  concurrency?: number;
  help?: boolean;
}

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgsError';
  }
}

const isOutputFormat = (value: string | undefined): value is OutputFormat => value === 'table' || value === 'json';

export const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--folder':
        args.folder = argv[++i];
        break;
      case '--type': {
        const raw = argv[++i] ?? '';
        const documentType = parseDocumentType(raw);
        if (!documentType) {
          throw new CliArgsError(`Unknown document type "${raw}". Expected one of: ${DOCUMENT_TYPES.join(', ')}`);
        }
        args.documentType = documentType;
        break;
      }
      case '--format': {
        const format = argv[++i];
        if (!isOutputFormat(format)) {
          throw new CliArgsError(`Unknown format "${format ?? ''}". Expected table or json`);
        }
        args.format = format;
        break;
      }
      case '--concurrency': {
        const concurrency = Number.parseInt(argv[++i] ?? '', 10);
        if (!Number.isInteger(concurrency) || concurrency < 1) {
          throw new CliArgsError('--concurrency must be a positive integer');
        }
        args.concurrency = concurrency;
        break;
      }
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new CliArgsError(`Unknown option: ${arg}`);
    }
  }

  return args;
};
