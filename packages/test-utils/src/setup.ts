/**
 * Test setup: property-test defaults and Effect structural equality for every suite.
 */
import { addEqualityTesters } from '@effect/vitest';
import fc from 'fast-check';
import { TEST_CONSTANTS } from './constants.ts';

// --- [ENTRY_POINT] -----------------------------------------------------------

fc.configureGlobal(TEST_CONSTANTS.fc);
addEqualityTesters();
