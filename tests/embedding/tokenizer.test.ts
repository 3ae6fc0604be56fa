import { describe, it, expect } from 'vitest';
import { tokenize } from '../../src/embedding/tokenizer.js';

describe('tokenize', () => {
  it('should split punctuation off as standalone tokens', () => {
    expect(tokenize('foo(bar)')).toEqual(['foo', '(', 'bar', ')']);
  });

  it('should lowercase and tokenize a CREATE TABLE statement', () => {
    const tokens = tokenize('CREATE TABLE Users (id INT PRIMARY KEY, name VARCHAR(50));');

    expect(tokens).toEqual([
      'create', 'table', 'users', '(', 'id', 'int', 'primary', 'key', ',',
      'name', 'varchar', '(', '50', ')', ')', ';',
    ]);
  });

  it('should split on any whitespace and drop empty tokens', () => {
    expect(tokenize('  orders\n\ttotal   REAL ')).toEqual(['orders', 'total', 'real']);
    expect(tokenize('')).toEqual([]);
    expect(tokenize(' \n\t ')).toEqual([]);
  });

  it('should keep underscores and dots inside tokens', () => {
    expect(tokenize('customer_id main.orders')).toEqual(['customer_id', 'main.orders']);
  });

  describe('stop words', () => {
    it('should keep stop words by default', () => {
      expect(tokenize('the name of the user')).toEqual(['the', 'name', 'of', 'the', 'user']);
    });

    it('should remove stop words when enabled', () => {
      expect(tokenize('The name of the user', { removeStopWords: true })).toEqual(['name', 'user']);
    });

    it('should not treat SQL vocabulary as stop words', () => {
      expect(tokenize('on delete set null', { removeStopWords: true })).toEqual([
        'on', 'delete', 'set', 'null',
      ]);
    });
  });
});
