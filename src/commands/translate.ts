import { parseArgs } from 'util';

import { describeError, localize } from '../i18n/localize';
import { TranslationService } from '../services/TranslationService';
import { ServiceLogger } from '../utils/logger';
import type { Command, CommandIO } from './io';

export function createTranslateCommand(
  service: TranslationService,
  io: CommandIO,
  logger: ServiceLogger,
): Command {
  return async (args) => {
    const { values, positionals } = parseArgs({
      args,
      options: {
        source: { type: 'string', short: 's', default: 'en' },
        target: { type: 'string', short: 't', default: 'ja' },
        text: { type: 'string' },
      },
      allowPositionals: true,
    });

    const text = values.text ?? (positionals.length > 0 ? positionals.join(' ') : await io.readStdin());
    if (text === '') {
      io.err(localize('command.translate.usage'));
      return 2;
    }

    const result = await service.translate(text, values.source, values.target, {
      onStatus: (message) => io.err(message),
    });

    if (result.isFailure()) {
      logger.error('Translate command failed.', result.error);
      io.err(describeError(result.error));
      return 1;
    }

    io.out(result.value);
    return 0;
  };
}
