/**
 * remindctl Command Model Unit Tests
 */

import {
  buildArgs,
  isReadCommand,
  producesOutput,
  validateText,
} from '../../src/integrations/remindctl-commands.js';

describe('remindctl commands', () => {
  describe('buildArgs', () => {
    it('should append the safety flags after the subcommand', () => {
      expect(buildArgs({ op: 'status' })).toEqual({
        ok: true,
        args: ['status', '--json', '--no-input', '--no-color'],
      });
      expect(buildArgs({ op: 'lists' })).toEqual({
        ok: true,
        args: ['list', '--json', '--no-input', '--no-color'],
      });
    });

    it('should pass the show filter positionally and the list as an option', () => {
      const result = buildArgs({ op: 'show', filter: 'today', list: 'Work' });

      expect(result).toEqual({
        ok: true,
        args: ['show', 'today', '--list', 'Work', '--json', '--no-input', '--no-color'],
      });
    });

    it('should map every add field to its option', () => {
      const result = buildArgs({
        op: 'add',
        title: 'Buy milk',
        list: 'Groceries',
        due: '2026-03-01',
        notes: 'two litres',
        priority: 'high',
      });

      expect(result).toEqual({
        ok: true,
        args: [
          'add',
          '--title',
          'Buy milk',
          '--list',
          'Groceries',
          '--due',
          '2026-03-01',
          '--notes',
          'two litres',
          '--priority',
          'high',
          '--json',
          '--no-input',
          '--no-color',
        ],
      });
    });

    it('should keep a title that starts with a dash as an option value', () => {
      const result = buildArgs({ op: 'add', title: '-5 pushups' });

      expect(result).toEqual({
        ok: true,
        args: ['add', '--title', '-5 pushups', '--json', '--no-input', '--no-color'],
      });
    });

    it('should map edit flags including clear-due and completion', () => {
      expect(buildArgs({ op: 'edit', id: 'AB12', clearDue: true, complete: false })).toEqual({
        ok: true,
        args: ['edit', 'AB12', '--clear-due', '--incomplete', '--json', '--no-input', '--no-color'],
      });
      expect(buildArgs({ op: 'edit', id: 'AB12', complete: true })).toEqual({
        ok: true,
        args: ['edit', 'AB12', '--complete', '--json', '--no-input', '--no-color'],
      });
    });

    it('should force deletes and never force a dry run', () => {
      expect(buildArgs({ op: 'delete', ids: ['A1', 'B2'] })).toEqual({
        ok: true,
        args: ['delete', 'A1', 'B2', '--force', '--json', '--no-input', '--no-color'],
      });
      expect(buildArgs({ op: 'delete', ids: ['A1'], dryRun: true })).toEqual({
        ok: true,
        args: ['delete', 'A1', '--dry-run', '--json', '--no-input', '--no-color'],
      });
    });

    it('should build complete with dry run', () => {
      expect(buildArgs({ op: 'complete', ids: ['A1'], dryRun: true })).toEqual({
        ok: true,
        args: ['complete', 'A1', '--dry-run', '--json', '--no-input', '--no-color'],
      });
    });

    it('should build list mutations', () => {
      expect(buildArgs({ op: 'list-create', name: 'Errands' })).toEqual({
        ok: true,
        args: ['list', 'Errands', '--create', '--json', '--no-input', '--no-color'],
      });
      expect(buildArgs({ op: 'list-rename', name: 'Errands', newName: 'Chores' })).toEqual({
        ok: true,
        args: ['list', 'Errands', '--rename', 'Chores', '--json', '--no-input', '--no-color'],
      });
      expect(buildArgs({ op: 'list-delete', name: 'Chores' })).toEqual({
        ok: true,
        args: ['list', 'Chores', '--delete', '--force', '--json', '--no-input', '--no-color'],
      });
    });

    it('should require at least one id', () => {
      expect(buildArgs({ op: 'complete', ids: [] })).toEqual({
        ok: false,
        field: 'ids',
        message: 'at least one id is required',
      });
    });

    it('should reject positional values that look like options', () => {
      expect(buildArgs({ op: 'delete', ids: ['--all'] })).toEqual({
        ok: false,
        field: 'id',
        message: "id cannot start with '-'",
      });
      expect(buildArgs({ op: 'list-create', name: '-x' })).toEqual({
        ok: false,
        field: 'name',
        message: "name cannot start with '-'",
      });
    });

    it('should reject control characters before anything runs', () => {
      expect(buildArgs({ op: 'add', title: 'Pay\u0007rent' })).toEqual({
        ok: false,
        field: 'title',
        message: 'title contains control characters',
      });
      expect(buildArgs({ op: 'list-rename', name: 'Home', newName: 'A\nB' })).toEqual({
        ok: false,
        field: 'newName',
        message: 'newName contains control characters',
      });
    });
  });

  describe('validateText', () => {
    it('should reject an empty title', () => {
      expect(validateText('', 'title', 'title')).toBe('title cannot be empty');
    });

    it('should count code points, not UTF-16 units', () => {
      const emoji = '\u{1F600}'.repeat(300);

      expect(validateText(emoji, 'title', 'title')).toBeNull();
      expect(validateText(`${emoji}x`, 'title', 'title')).toBe('title exceeds max length 300');
    });

    it('should limit list names to 120 characters', () => {
      expect(validateText('a'.repeat(120), 'name', 'listName')).toBeNull();
      expect(validateText('a'.repeat(121), 'name', 'listName')).toBe(
        'name exceeds max length 120'
      );
    });

    it('should allow line breaks and tabs in notes only', () => {
      expect(validateText('line one\n\tline two', 'notes', 'notes')).toBeNull();
      expect(validateText('', 'notes', 'notes')).toBeNull();
      expect(validateText('bad\u0000byte', 'notes', 'notes')).toBe(
        'notes contains control characters'
      );
      expect(validateText('two\nlines', 'title', 'title')).toBe(
        'title contains control characters'
      );
    });
  });

  describe('command classes', () => {
    it('should classify reads and output-less commands', () => {
      expect(isReadCommand('show')).toBe(true);
      expect(isReadCommand('add')).toBe(false);
      expect(producesOutput('list-create')).toBe(false);
      expect(producesOutput('delete')).toBe(true);
    });
  });
});
