#!/usr/bin/env node
/**
 * Notice Accuracy MCP Server - CLI Entry Point
 *
 * Usage:
 *   notice-accuracy-mcp                 # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
