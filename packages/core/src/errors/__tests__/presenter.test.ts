import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import { createDiagnostic, DIAGNOSTIC_CODES } from '../../diag/codes.js';
import {
  ConfigError,
  GenerationFailedError,
  InputError,
  ModelError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('CLI view lists one line per diagnostic under a one-line title', () => {
    const err = new ModelError({
      diagnostics: [
        createDiagnostic(DIAGNOSTIC_CODES.UNKNOWN_TYPE, 'Circle.center', 'Unknown type "Pointt"'),
        createDiagnostic(DIAGNOSTIC_CODES.DUPLICATE_NAME, 'Shape', 'The name is declared twice'),
      ],
    });
    const cli = new ErrorPresenter('dev', {}).formatForCLI(err);

    expect(cli.title).toBe('Error E011: The meta-model is invalid (2 problem(s)):');
    expect(cli.code).toBe(ErrorCode.MODEL_RESOLUTION_FAILED);
    expect(cli.exitCode).toBe(21);
    expect(cli.details).toEqual([
      'UNKNOWN_TYPE Circle.center: Unknown type "Pointt"',
      'DUPLICATE_NAME Shape: The name is declared twice',
    ]);
  });

  test('generation failures made only of missing snippets map to E101', () => {
    const err = new GenerationFailedError({
      diagnostics: [
        createDiagnostic(DIAGNOSTIC_CODES.MISSING_SNIPPET, 'Blob', 'The snippet "types/Blob.ts" is missing'),
      ],
    });
    const cli = new ErrorPresenter('dev').formatForCLI(err);
    expect(cli.code).toBe(ErrorCode.MISSING_SNIPPET);
    expect(cli.exitCode).toBe(31);
    expect(cli.workaround).toBe('Add the missing files to the snippets directory');
  });

  test('CLI view respects NO_COLOR and FORCE_COLOR', () => {
    const err = new ConfigError({ message: 'Invalid', setting: 'emit.indent' });

    // NO_COLOR disables
    process.env.NO_COLOR = '1';
    let presenter = new ErrorPresenter('dev', { colors: true });
    let cli = presenter.formatForCLI(err);
    expect(cli.colors).toBe(false);

    // FORCE_COLOR enables
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    presenter = new ErrorPresenter('dev', { colors: false });
    cli = presenter.formatForCLI(err);
    expect(cli.colors).toBe(true);
  });

  test('CLI view provides the location from file then setting', () => {
    const presenter = new ErrorPresenter('dev', {});
    const input = new InputError({ message: 'Cannot read', file: 'model.json' });
    expect(presenter.formatForCLI(input).location).toBe('Location: model.json');

    const config = new ConfigError({ message: 'Bad key', setting: 'jsonization.discriminatorKey' });
    expect(presenter.formatForCLI(config).location).toBe(
      'Location: jsonization.discriminatorKey'
    );
  });

  test('prod presenter leaves colors off unless asked', () => {
    const err = new InputError({ message: 'Cannot read', file: 'model.json' });

    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
    expect(new ErrorPresenter('prod', { colors: true }).formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod', { terminalWidth: 40 }).formatForCLI(err).terminalWidth).toBe(40);
  });
});
