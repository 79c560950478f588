#!/usr/bin/env tsx
/**
 * Creates the sample employee and project tables and seeds a few rows.
 * Safe to run repeatedly.
 */

import { loadConfig } from '../src/config.js';
import { ControlDb, poolRunner } from '../src/tools/controlDb.js';
import { closeAllPools, getPool } from '../src/tools/pools.js';

const SEED = `
  CREATE TABLE IF NOT EXISTS employee (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    department VARCHAR(50) NOT NULL,
    salary NUMERIC(12, 2) NOT NULL,
    hire_date DATE
  );

  CREATE TABLE IF NOT EXISTS project (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    description VARCHAR(500),
    start_date DATE NOT NULL,
    end_date DATE,
    budget NUMERIC(14, 2),
    department VARCHAR(50) NOT NULL
  );

  INSERT INTO employee (name, department, salary, hire_date)
  SELECT * FROM (VALUES
    ('Alice Johnson', 'Engineering', 85000, DATE '2021-03-15'),
    ('Bob Smith', 'Sales', 62000, DATE '2022-07-01'),
    ('Carol White', 'HR', 58000, DATE '2020-11-20')
  ) AS seed(name, department, salary, hire_date)
  WHERE NOT EXISTS (SELECT 1 FROM employee);

  INSERT INTO project (name, description, start_date, budget, department)
  SELECT * FROM (VALUES
    ('Website Redesign', 'Refresh of the public site', DATE '2024-01-10', 120000, 'Marketing'),
    ('CRM Migration', 'Move sales pipeline to the new CRM', DATE '2024-04-01', 80000, 'Sales')
  ) AS seed(name, description, start_date, budget, department)
  WHERE NOT EXISTS (SELECT 1 FROM project);
`;

async function setupDatabase() {
  const config = loadConfig();
  const pool = getPool(config.databaseUrl);

  try {
    console.log('🔧 Creating sample tables...');
    await pool.query(SEED);
    console.log('✓ employee and project tables ready');

    if (config.controlDbUrl) {
      await new ControlDb(poolRunner(getPool(config.controlDbUrl))).initialize();
    }
  } finally {
    await closeAllPools();
  }
}

setupDatabase().catch((error) => {
  console.error('❌ Error:', error);
  process.exit(1);
});
