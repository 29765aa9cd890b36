import { createInterface, type Interface } from 'readline';
import { env } from './config/environment';
import { logger } from './config/logger';
import { AddressBook } from './services/address-book/address-book.service';
import { ContactManagerSession, type SessionIO } from './services/cli/session.service';
import { InputClosedError } from './utils/errors';

/**
 * Terminal IO over one readline interface. `ask` pulls lines from the
 * interface's iterator, so a closed stdin surfaces as InputClosedError.
 */
function createTerminalIO(rl: Interface): SessionIO {
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string> {
      process.stdout.write(question);
      const next = await lines.next();
      if (next.done) {
        throw new InputClosedError();
      }
      return next.value;
    },
    print(line: string): void {
      process.stdout.write(`${line}\n`);
    },
  };
}

/**
 * Save the book when the process is asked to terminate
 */
function setupGracefulShutdown(addressBook: AddressBook, rl: Interface): void {
  // Ctrl-C ends the input; main then saves the book
  rl.on('SIGINT', () => rl.close());

  process.on('SIGTERM', () => {
    logger.info({ signal: 'SIGTERM' }, 'Received shutdown signal');
    try {
      addressBook.save(env.ADDRESS_BOOK_PATH);
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  });
}

/**
 * Read commands until `exit` (which saves through the session) or end of input
 */
async function runCommandLoop(
  session: ContactManagerSession,
  io: SessionIO
): Promise<'exit' | 'closed'> {
  try {
    for (;;) {
      const input = await io.ask('Enter a command: ');
      if ((await session.handle(input)) === 'exit') {
        return 'exit';
      }
    }
  } catch (error) {
    if (!(error instanceof InputClosedError)) {
      throw error;
    }
    logger.debug('Input closed, leaving command loop');
    return 'closed';
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  try {
    logger.info(
      { path: env.ADDRESS_BOOK_PATH, pageSize: env.PAGE_SIZE, nodeEnv: env.NODE_ENV },
      'Starting contact book...'
    );

    // A corrupt file aborts here, before anything could overwrite it
    const addressBook = new AddressBook();
    addressBook.load(env.ADDRESS_BOOK_PATH);

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const io = createTerminalIO(rl);
    const session = new ContactManagerSession(addressBook, io, {
      pageSize: env.PAGE_SIZE,
      savePath: env.ADDRESS_BOOK_PATH,
    });
    setupGracefulShutdown(addressBook, rl);

    // After end of input a failed save is fatal
    if ((await runCommandLoop(session, io)) === 'closed') {
      addressBook.save(env.ADDRESS_BOOK_PATH);
    }
    rl.close();
  } catch (error) {
    logger.fatal({ error }, 'Contact book stopped with an error');
    process.exit(1);
  }
}

// Start application if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
