/**
 * CLI entry point for menukit
 *
 * Runs the lab menus in the current terminal through the Node terminal
 * adapter, or edits the config file with `menukit config`.
 */

import { createNodeTerminal } from './backend/nodeTerminal';
import { TerminalBackend } from './backend/terminal';
import {
  CONFIG_FILE,
  parseArgs,
  readConfigFile,
  resolveConfig,
  runConfigWizard,
  type MenukitConfig,
} from './config';
import { createContext, type Logger } from './devices/context';
import { runLab } from './lab';
import { THEME_NAMES, getThemeColors, themes } from './themes';

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

type LogLevel = 'log' | 'warn' | 'error';

interface BufferedLogger extends Logger {
  /** Print everything collected so far to the real console */
  flush(): void;
}

/**
 * The alternate screen hides console output, so messages are held until
 * the terminal is restored
 */
function createBufferedLogger(): BufferedLogger {
  const entries: { level: LogLevel; args: unknown[] }[] = [];
  return {
    log: (...args: unknown[]) => { entries.push({ level: 'log', args }); },
    warn: (...args: unknown[]) => { entries.push({ level: 'warn', args }); },
    error: (...args: unknown[]) => { entries.push({ level: 'error', args }); },
    flush: () => {
      for (const { level, args } of entries.splice(0, entries.length)) {
        console[level](...args);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  menukit: terminal menus driven by keyboard, mouse and joystick

  Usage:
    menukit                      Run the lab menus
    menukit config               Edit ${CONFIG_FILE}
    menukit --theme <theme>      Set color theme
    menukit --title <title>      Set window title
    menukit --size <WxH>         Window size in cells (e.g. 40x12)
    menukit --flags <A,B>        Screen flags (FULLSCREEN, DOUBLEBUF, HWSURFACE,
                                 OPENGL, RESIZABLE, NOFRAME)
    menukit --fps <n>            Outer loop frame rate
    menukit --menu-fps <n>       Menu poll rate
    menukit --config <path>      Use another config file
    menukit --list-themes        List all themes
    menukit --help               Show this help

  Controls:
    Up / Down            Move focus
    Enter / Space        Select
    Mouse                Hover to focus, click to select
    ESC                  Close menu / ask to exit
    Ctrl+C               Quit
`);
}

function listThemes() {
  for (const name of THEME_NAMES) {
    console.log(`  ${name.padEnd(12)} ${themes[name].name}`);
  }
}

async function runInTerminal(config: MenukitConfig): Promise<void> {
  const logger = createBufferedLogger();
  const terminal = createNodeTerminal();
  const backend = new TerminalBackend(terminal, { keyReleaseDelay: config.keyReleaseDelay, logger });

  const restore = () => {
    backend.close();
    terminal.restore();
  };
  process.on('exit', restore);
  process.on('SIGTERM', () => { restore(); process.exit(0); });

  backend.open();
  try {
    const ctx = createContext(backend, {
      logger,
      screen: {
        size: config.size,
        color: getThemeColors(config.theme).background,
        title: config.title,
        flags: config.flags,
      },
    });
    await runLab(ctx, config);
  } finally {
    restore();
    logger.flush();
  }
}

async function main(argv: readonly string[]): Promise<void> {
  const options = parseArgs(argv);

  if (options.command === 'help') {
    printHelp();
    return;
  }
  if (options.command === 'listThemes') {
    listThemes();
    return;
  }

  const config = resolveConfig(readConfigFile(options.configPath), options.overrides);

  if (options.command === 'config') {
    await runConfigWizard(options.configPath, config);
    return;
  }

  await runInTerminal(config);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`[menukit] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
