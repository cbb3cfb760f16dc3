import { describe, it, expect } from 'vitest';
import { createDb } from '../../../src/shared/db/db';
import { AppError } from '../../../src/shared/http/errors';

describe('createDb', () => {
  it('has no built-in driver for sqlite; hosts supply a DataSource instead', () => {
    expect(() => createDb('sqlite', ':memory:')).toThrow('No built-in driver for dialect: sqlite');
  });

  it('refuses dialects that only have a pagination entry', () => {
    expect(() => createDb('oracle', 'oracle://localhost/users')).toThrow(AppError);
  });
});
