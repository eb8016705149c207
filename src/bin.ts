#!/usr/bin/env node
/**
 * Duplex Sequencer MCP Server - CLI Entry Point
 *
 * Usage:
 *   duplex-sequencer-mcp                # after npm install -g
 *   node dist/src/bin.js                # direct invocation
 *
 * @module bin
 */

import './index.js';
