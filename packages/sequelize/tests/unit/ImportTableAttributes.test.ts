import { describe, it, expect } from 'vitest';
import { DataTypes } from 'sequelize';
import { importTableAttributes } from '../../src/models/ImportTableAttributes.js';

describe('importTableAttributes', () => {
  it('should map each column to a nullable attribute of its type', () => {
    const attributes = importTableAttributes([
      { name: 'id', type: 'INTEGER' },
      { name: 'price', type: 'REAL' },
      { name: 'label', type: 'TEXT' },
    ]);

    expect(attributes).toEqual({
      id: { type: DataTypes.INTEGER, allowNull: true },
      price: { type: DataTypes.REAL, allowNull: true },
      label: { type: DataTypes.TEXT, allowNull: true },
    });
  });

  it('should add no surrogate key or timestamps', () => {
    expect(Object.keys(importTableAttributes([{ name: 'sku', type: 'TEXT' }]))).toEqual(['sku']);
  });
});
