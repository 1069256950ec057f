import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['Shared', 'Pyodide-Sandbox']);
