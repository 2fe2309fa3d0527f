/**
 * Global test setup file for Vitest.
 *
 * Loaded before each test file of the agent project.
 */

import { vi } from 'vitest'

// Silence diagnostic output; tests that assert on logging spy on console themselves.
vi.spyOn(console, 'debug').mockImplementation(() => {})
vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
