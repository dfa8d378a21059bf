import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  testMatch: ['**/__tests__/**/*.test.ts'],
  verbose: false,
  roots: ['<rootDir>/server/src', '<rootDir>/server/__tests__'],
  moduleFileExtensions: ['ts', 'js', 'json'],
  maxWorkers: 1,
  setupFiles: ['<rootDir>/server/__tests__/pg-mem-setup.ts'],
};

export default config;
