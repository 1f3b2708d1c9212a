import { parseArgs } from 'util';

import { describeError } from '../i18n/localize';
import { TranslationService } from '../services/TranslationService';
import { ServiceLogger } from '../utils/logger';
import type { Command, CommandIO } from './io';

export function createBacktranslateCommand(
  service: TranslationService,
  io: CommandIO,
  logger: ServiceLogger,
): Command {
  return async (args) => {
    const { values, positionals } = parseArgs({
      args,
      options: {
        source: { type: 'string', short: 's', default: 'en' },
        intermediate: { type: 'string', short: 'i', default: 'ja' },
        text: { type: 'string' },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: true,
    });

    const text = values.text ?? (positionals.length > 0 ? positionals.join(' ') : await io.readStdin());
    const result = await service.backtranslate(text, {
      sourceLang: values.source,
      intermediateLang: values.intermediate,
      onStatus: (message) => io.err(message),
    });

    if (result.isFailure()) {
      logger.error('Backtranslate command failed.', result.error);
      io.err(describeError(result.error));
      return 1;
    }

    const outcome = result.value;
    if (values.json) {
      io.out(JSON.stringify(outcome, null, 2));
    } else {
      io.out(`${outcome.intermediateLang}: ${outcome.intermediate}`);
      io.out(`${outcome.sourceLang}: ${outcome.final}`);
    }
    return 0;
  };
}
