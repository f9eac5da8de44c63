/**
 * Global test setup file for Vitest.
 *
 * This file is loaded before each test file and sets up global mocks.
 */

import { vi } from 'vitest'

// Silence console output in tests to reduce noise.
// Individual tests can spy on console methods again if they need to assert output.
vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
