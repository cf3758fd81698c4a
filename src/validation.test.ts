import {
  isValidDate,
  mergeExpense,
  parseDateParam,
  parseExpenseId,
  parseMinAmount,
  today,
  validateExpenseInput,
  validateExpenseUpdate
} from './validation';

describe('validateExpenseInput', () => {
  const validInput = {
    category: 'Food',
    amount: 100.5,
    date: '2024-01-15',
  };

  it('should validate correct input', () => {
    const result = validateExpenseInput(validInput);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should reject missing amount', () => {
    const input = { ...validInput, amount: undefined };
    const result = validateExpenseInput(input);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Amount is required');
  });

  it('should reject negative amount', () => {
    const input = { ...validInput, amount: -10 };
    const result = validateExpenseInput(input);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Amount must be greater than 0');
  });

  it('should reject zero amount', () => {
    const input = { ...validInput, amount: 0 };
    const result = validateExpenseInput(input);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Amount must be greater than 0');
  });

  it('should accept the smallest cent amount', () => {
    const result = validateExpenseInput({ ...validInput, amount: 0.01 });
    expect(result.valid).toBe(true);
  });

  it('should reject amount given as a string', () => {
    const result = validateExpenseInput({ ...validInput, amount: '10' });
    expect(result.errors).toEqual(['Amount must be a valid number']);
  });

  it('should accept a 50 character category', () => {
    const result = validateExpenseInput({ ...validInput, category: 'a'.repeat(50) });
    expect(result.valid).toBe(true);
  });

  it('should reject a 51 character category', () => {
    const result = validateExpenseInput({ ...validInput, category: 'a'.repeat(51) });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Category must be 50 characters or less']);
  });

  it('should reject blank category', () => {
    const input = { ...validInput, category: '   ' };
    const result = validateExpenseInput(input);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Category cannot be empty');
  });

  it('should reject missing date', () => {
    const input = { ...validInput, date: undefined };
    const result = validateExpenseInput(input);
    expect(result.errors).toEqual(['Date is required']);
  });

  it('should reject invalid date format', () => {
    const input = { ...validInput, date: '15-01-2024' };
    const result = validateExpenseInput(input);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Date must be in YYYY-MM-DD format');
  });

  it('should reject a day that does not exist', () => {
    const result = validateExpenseInput({ ...validInput, date: '2023-02-29' });
    expect(result.errors).toEqual(['Date is not a valid date']);
  });

  it('should report every invalid field', () => {
    const result = validateExpenseInput({ category: '', amount: -1, date: 'soon' });
    expect(result.errors).toEqual([
      'Amount must be greater than 0',
      'Category cannot be empty',
      'Date must be in YYYY-MM-DD format'
    ]);
  });

  it('should reject null input', () => {
    const result = validateExpenseInput(null);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('Request body must be a valid JSON object');
  });

  it('should trim whitespace from category and date', () => {
    const result = validateExpenseInput({ category: '  Food  ', amount: 12, date: ' 2024-01-15 ' });
    expect(result.valid && result.value).toEqual({ category: 'Food', amount: 12, date: '2024-01-15' });
  });
});

describe('validateExpenseUpdate', () => {
  it('should accept a partial body', () => {
    const result = validateExpenseUpdate({ amount: 99 });
    expect(result.valid && result.value).toEqual({ amount: 99 });
  });

  it('should ignore id and unknown fields', () => {
    const result = validateExpenseUpdate({ id: 7, note: 'lunch', category: 'Travel' });
    expect(result.valid && result.value).toEqual({ category: 'Travel' });
  });

  it('should check the fields that are present', () => {
    const result = validateExpenseUpdate({ amount: 0, date: '2024-13-01' });
    expect(result.errors).toEqual(['Amount must be greater than 0', 'Date is not a valid date']);
  });

  it('should reject an array body', () => {
    const result = validateExpenseUpdate([]);
    expect(result.errors).toEqual(['Request body must be a valid JSON object']);
  });
});

describe('mergeExpense', () => {
  it('should change only the patched fields', () => {
    const existing = { id: 3, category: 'Food', amount: 10, date: '2024-01-01' };
    expect(mergeExpense(existing, { amount: 99 })).toEqual({
      id: 3,
      category: 'Food',
      amount: 99,
      date: '2024-01-01'
    });
  });
});

describe('isValidDate', () => {
  it('should accept leap days in leap years', () => {
    expect(isValidDate('2024-02-29')).toBe(true);
  });

  it('should reject out of range months', () => {
    expect(isValidDate('2024-00-10')).toBe(false);
  });
});

describe('parseExpenseId', () => {
  it('should parse a positive integer', () => {
    expect(parseExpenseId('42')).toEqual({ value: 42 });
    expect(parseExpenseId(5)).toEqual({ value: 5 });
  });

  it('should treat zero as a missing id', () => {
    expect(parseExpenseId('0')).toEqual({ error: 'Expense id is required' });
    expect(parseExpenseId(undefined)).toEqual({ error: 'Expense id is required' });
  });

  it('should reject non-integer ids', () => {
    expect(parseExpenseId('abc')).toEqual({ error: 'Expense id must be an integer' });
    expect(parseExpenseId('1.5')).toEqual({ error: 'Expense id must be an integer' });
    expect(parseExpenseId('0x10')).toEqual({ error: 'Expense id must be an integer' });
  });

  it('should pass negative integers on to the lookup', () => {
    expect(parseExpenseId('-3')).toEqual({ value: -3 });
    expect(parseExpenseId('-0')).toEqual({ error: 'Expense id is required' });
  });
});

describe('parseMinAmount', () => {
  it('should default to zero', () => {
    expect(parseMinAmount(undefined)).toEqual({ value: 0 });
  });

  it('should parse decimal strings', () => {
    expect(parseMinAmount('12.5')).toEqual({ value: 12.5 });
  });

  it('should reject text', () => {
    expect(parseMinAmount('lots')).toEqual({ error: 'Minimum amount must be a valid number' });
  });

  it('should accept negative and leading-dot decimals', () => {
    expect(parseMinAmount('-2')).toEqual({ value: -2 });
    expect(parseMinAmount('.5')).toEqual({ value: 0.5 });
  });

  it('should reject hex, binary, exponent and padded numbers', () => {
    for (const input of ['0x10', '0b1', '1e2', ' 1e2 ', ' 12']) {
      expect(parseMinAmount(input)).toEqual({ error: 'Minimum amount must be a valid number' });
    }
  });
});

describe('parseDateParam', () => {
  it('should treat an empty value as absent', () => {
    expect(parseDateParam('', 'start_date')).toEqual({ value: undefined });
  });

  it('should name the parameter in errors', () => {
    expect(parseDateParam('yesterday', 'end_date')).toEqual({
      error: 'end_date must be in YYYY-MM-DD format'
    });
  });
});

describe('today', () => {
  it('should format the local calendar date', () => {
    expect(today(new Date(2024, 2, 5, 23, 59))).toBe('2024-03-05');
  });
});
