import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AddressBook } from '../../../../src/services/address-book/address-book.service';
import { ContactRecord } from '../../../../src/services/address-book/contact-record';
import { ContactManagerSession, type SessionIO } from '../../../../src/services/cli/session.service';
import { StorageError } from '../../../../src/utils/errors';

/**
 * IO double answering prompts from a script and collecting printed lines
 */
function createScriptedIO(answers: string[] = []) {
  const output: string[] = [];
  const io: SessionIO = {
    ask: vi.fn(async () => {
      const answer = answers.shift();
      if (answer === undefined) {
        throw new Error('No scripted answer left');
      }
      return answer;
    }),
    print: (line: string) => {
      output.push(line);
    },
  };
  return { io, output, answers };
}

describe('ContactManagerSession', () => {
  let book: AddressBook;

  beforeEach(() => {
    vi.clearAllMocks();
    book = new AddressBook();
  });

  it('should signal exit', async () => {
    const { io } = createScriptedIO();
    const session = new ContactManagerSession(book, io);

    expect(await session.handle('exit')).toBe('exit');
    expect(await session.handle('QUIT')).toBe('exit');
  });

  describe('exit with a save path', () => {
    it('should save the book and signal exit', async () => {
      const save = vi.spyOn(book, 'save').mockImplementation(() => undefined);
      const { io, output } = createScriptedIO();
      const session = new ContactManagerSession(book, io, { savePath: '/tmp/book.json' });

      expect(await session.handle('exit')).toBe('exit');
      expect(save).toHaveBeenCalledWith('/tmp/book.json');
      expect(output).toEqual([]);
    });

    it('should print a failed save and keep the session open', async () => {
      book.add(new ContactRecord('Alice'));
      vi.spyOn(book, 'save').mockImplementation(() => {
        throw new StorageError('Failed to save address book to /tmp/book.json');
      });
      const { io, output } = createScriptedIO();
      const session = new ContactManagerSession(book, io, { savePath: '/tmp/book.json' });

      expect(await session.handle('exit')).toBe('continue');
      expect(output).toEqual(['Error: Failed to save address book to /tmp/book.json']);
      expect(book.has('Alice')).toBe(true);
    });
  });

  it('should report unknown commands and continue', async () => {
    const { io, output } = createScriptedIO();
    const session = new ContactManagerSession(book, io);

    expect(await session.handle('dance')).toBe('continue');
    expect(output).toEqual(['Invalid command. Try again.']);
  });

  describe('add', () => {
    it('should add a contact with birthday and phones', async () => {
      const { io, output } = createScriptedIO([
        ' Alice ',
        '1990-05-10',
        '5551234567',
        '5559876543',
        '',
      ]);
      const session = new ContactManagerSession(book, io);

      await session.handle('add');

      expect(book.get('Alice')?.render()).toBe(
        'Name: Alice, Phones: 5551234567, 5559876543, Birthday: 1990-05-10'
      );
      expect(output).toEqual(['Contact Alice saved.']);
    });

    it('should re-prompt after a rejected phone', async () => {
      const { io, output } = createScriptedIO(['Bob', '', '12345', '1111111111', '']);
      const session = new ContactManagerSession(book, io);

      await session.handle('add');

      expect(book.get('Bob')?.phones).toEqual(['1111111111']);
      expect(output).toEqual(['Error: Phone must be 10 digits long', 'Contact Bob saved.']);
    });

    it('should abort on an invalid birthday', async () => {
      const { io, output } = createScriptedIO(['Bob', '1990/05/10']);
      const session = new ContactManagerSession(book, io);

      expect(await session.handle('add')).toBe('continue');
      expect(book.size).toBe(0);
      expect(output).toEqual(["Error: Invalid date format. Use 'YYYY-MM-DD'"]);
    });

    it('should refuse an empty name', async () => {
      const { io, output } = createScriptedIO(['   ']);
      const session = new ContactManagerSession(book, io);

      await session.handle('add');

      expect(book.size).toBe(0);
      expect(output).toEqual(['Name cannot be empty.']);
    });
  });

  describe('remove', () => {
    it('should remove an existing contact', async () => {
      book.add(new ContactRecord('Alice'));
      const { io, output } = createScriptedIO(['Alice']);
      const session = new ContactManagerSession(book, io);

      await session.handle('remove');

      expect(book.has('Alice')).toBe(false);
      expect(output).toEqual(['Contact Alice removed.']);
    });

    it('should report a missing contact', async () => {
      const { io, output } = createScriptedIO(['Zed']);
      const session = new ContactManagerSession(book, io);

      await session.handle('remove');

      expect(output).toEqual(['Contact Zed not found.']);
    });
  });

  describe('find', () => {
    beforeEach(() => {
      book.add(new ContactRecord('Alice', '5551234567', '1990-05-10'));
      book.add(new ContactRecord('Bob', '2222222222'));
    });

    it('should print records matching a name', async () => {
      const { io, output } = createScriptedIO(['ali']);
      await new ContactManagerSession(book, io).handle('find by name');

      expect(output).toEqual(['Name: Alice, Phones: 5551234567, Birthday: 1990-05-10']);
    });

    it('should print records matching a phone', async () => {
      const { io, output } = createScriptedIO(['2222']);
      await new ContactManagerSession(book, io).handle('find by phone');

      expect(output).toEqual(['Name: Bob, Phones: 2222222222, Birthday: N/A']);
    });

    it('should say when nothing matches', async () => {
      const { io, output } = createScriptedIO(['9999999999']);
      await new ContactManagerSession(book, io).handle('find by phone');

      expect(output).toEqual(['No matching records found.']);
    });
  });

  describe('show all / next', () => {
    it('should print pages one at a time', async () => {
      for (let i = 1; i <= 5; i++) {
        book.add(new ContactRecord(`Contact ${i}`));
      }
      const { io, output } = createScriptedIO();
      const session = new ContactManagerSession(book, io, { pageSize: 2 });

      await session.handle('show all');
      expect(output.splice(0)).toEqual([
        'Page 1:',
        'Name: Contact 1, Phones: , Birthday: N/A',
        'Name: Contact 2, Phones: , Birthday: N/A',
        "More pages available. Type 'next' to see more.",
      ]);

      await session.handle('next');
      expect(output.splice(0)).toEqual([
        'Page 2:',
        'Name: Contact 3, Phones: , Birthday: N/A',
        'Name: Contact 4, Phones: , Birthday: N/A',
        "More pages available. Type 'next' to see more.",
      ]);

      await session.handle('next');
      expect(output.splice(0)).toEqual(['Page 3:', 'Name: Contact 5, Phones: , Birthday: N/A']);

      await session.handle('next');
      expect(output.splice(0)).toEqual(['No more pages.']);
    });

    it('should restart from the first page', async () => {
      for (let i = 1; i <= 3; i++) {
        book.add(new ContactRecord(`Contact ${i}`));
      }
      const { io, output } = createScriptedIO();
      const session = new ContactManagerSession(book, io, { pageSize: 2 });

      await session.handle('show all');
      await session.handle('show all');

      expect(output.filter((line) => line.startsWith('Page'))).toEqual(['Page 1:', 'Page 1:']);
    });

    it('should report an empty book', async () => {
      const { io, output } = createScriptedIO();
      const session = new ContactManagerSession(book, io);

      await session.handle('show all');
      await session.handle('next');

      expect(output).toEqual(['No contacts saved.', 'No more pages.']);
    });
  });

  describe('phone commands', () => {
    beforeEach(() => {
      book.add(new ContactRecord('Alice', '1111111111'));
    });

    it('should add a phone to an existing contact', async () => {
      const { io, output } = createScriptedIO(['Alice', '2222222222']);
      await new ContactManagerSession(book, io).handle('add phone');

      expect(book.get('Alice')?.phones).toEqual(['1111111111', '2222222222']);
      expect(output).toEqual(['Phone added.']);
    });

    it('should report a malformed phone', async () => {
      const { io, output } = createScriptedIO(['Alice', '22-22']);
      await new ContactManagerSession(book, io).handle('add phone');

      expect(book.get('Alice')?.phones).toEqual(['1111111111']);
      expect(output).toEqual(['Error: Phone must contain only digits']);
    });

    it('should edit a phone', async () => {
      const { io, output } = createScriptedIO(['Alice', '1111111111', '3333333333']);
      await new ContactManagerSession(book, io).handle('edit phone');

      expect(book.get('Alice')?.phones).toEqual(['3333333333']);
      expect(output).toEqual(['Phone updated.']);
    });

    it('should report an unknown phone on edit', async () => {
      const { io, output } = createScriptedIO(['Alice', '9999999999']);
      await new ContactManagerSession(book, io).handle('edit phone');

      expect(output).toEqual(['Phone 9999999999 not found.']);
    });

    it('should remove a phone', async () => {
      const { io, output } = createScriptedIO(['Alice', '1111111111']);
      await new ContactManagerSession(book, io).handle('remove phone');

      expect(book.get('Alice')?.phones).toEqual([]);
      expect(output).toEqual(['Phone removed.']);
    });

    it('should report a missing contact', async () => {
      const { io, output } = createScriptedIO(['Zed']);
      await new ContactManagerSession(book, io).handle('add phone');

      expect(output).toEqual(['Contact Zed not found.']);
    });
  });

  describe('birthday', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should print days until the next birthday', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2026, 9, 18, 9, 0));
      book.add(new ContactRecord('Alice', null, '1990-10-19'));
      book.add(new ContactRecord('Bob', null, '1990-05-10'));
      const { io, output } = createScriptedIO(['Alice', 'Bob']);
      const session = new ContactManagerSession(book, io);

      await session.handle('birthday');
      await session.handle('birthday');

      expect(output).toEqual(['Alice has a birthday in 1 day.', 'Bob has a birthday in 204 days.']);
    });

    it('should say when no birthday is set', async () => {
      book.add(new ContactRecord('Carol'));
      const { io, output } = createScriptedIO(['Carol']);
      await new ContactManagerSession(book, io).handle('birthday');

      expect(output).toEqual(['Carol has no birthday set.']);
    });
  });

  it('should list commands on help', async () => {
    const { io, output } = createScriptedIO();
    await new ContactManagerSession(book, io).handle('help');

    expect(output).toEqual([
      'Available commands: add, remove, find by name, find by phone, show all, next, add phone, edit phone, remove phone, birthday, help, exit',
    ]);
  });

  it('should let errors other than application errors propagate', async () => {
    const { io } = createScriptedIO();
    const session = new ContactManagerSession(book, io);

    await expect(session.handle('add')).rejects.toThrow('No scripted answer left');
  });

  it('should print application errors raised by the book', async () => {
    book.add(new ContactRecord('Alice'));
    vi.spyOn(book, 'remove').mockImplementation(() => {
      throw new StorageError('Disk unavailable');
    });
    const { io, output } = createScriptedIO(['Alice']);

    expect(await new ContactManagerSession(book, io).handle('remove')).toBe('continue');
    expect(output).toEqual(['Error: Disk unavailable']);
  });
});
