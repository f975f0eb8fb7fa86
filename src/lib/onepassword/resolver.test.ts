// Path: src/lib/onepassword/resolver.test.ts
// Unit tests for secure note resolution

import { describe, it, expect } from 'vitest';
import { OnePasswordClient } from './client.js';
import { findMatchingNotes, resolveNote } from './resolver.js';
import { AmbiguousError, NotFoundError } from '../../utils/error.js';
import { createFakeCli, field, note } from '../../../test/helpers/fake-cli.js';

describe('findMatchingNotes', () => {
  it('should match titles containing the locator', () => {
    const notes = [
      { id: '1', title: 'repo:acme/widgets' },
      { id: '2', title: 'Widgets env (repo:acme/widgets)' },
      { id: '3', title: 'repo:acme/gadgets' },
    ];

    expect(findMatchingNotes(notes, 'repo:acme/widgets').map(n => n.id)).toEqual(['1', '2']);
  });

  it('should be case-sensitive', () => {
    expect(findMatchingNotes([{ id: '1', title: 'FLY:myapp' }], 'fly:myapp')).toEqual([]);
  });
});

describe('resolveNote', () => {
  it('should return the single matching note with its fields', () => {
    const cli = createFakeCli({
      notes: [
        note('n1', 'repo:acme/widgets', [field('API_KEY', 'abc')]),
        note('n2', 'fly:myapp'),
      ],
    });
    const client = new OnePasswordClient({ run: cli.run });

    const resolved = resolveNote(client, 'repo:acme/widgets');

    expect(resolved.id).toBe('n1');
    expect(resolved.fields.find(f => f.label === 'API_KEY')?.value).toBe('abc');
    expect(cli.callsTo('op', 'get')[0].args[2]).toBe('n1');
  });

  it('should raise NotFoundError when nothing matches', () => {
    const cli = createFakeCli({ notes: [note('n2', 'fly:myapp')] });
    const client = new OnePasswordClient({ run: cli.run });

    expect(() => resolveNote(client, 'repo:acme/widgets')).toThrow(NotFoundError);
    expect(() => resolveNote(client, 'repo:acme/widgets')).toThrow(
      'There is no secure note in 1Password with a name containing `repo:acme/widgets`'
    );
  });

  it('should raise AmbiguousError when several notes match', () => {
    const cli = createFakeCli({
      notes: [note('n1', 'fly:myapp'), note('n2', 'fly:myapp-staging')],
    });
    const client = new OnePasswordClient({ run: cli.run });

    let error: unknown;
    try {
      resolveNote(client, 'fly:myapp');
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(AmbiguousError);
    expect(error instanceof AmbiguousError && error.titles).toEqual(['fly:myapp', 'fly:myapp-staging']);
    expect(cli.callsTo('op', 'get')).toHaveLength(0);
  });
});
