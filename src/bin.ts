#!/usr/bin/env node
/**
 * PDF Report Merge MCP Server - bin entry point
 *
 * Usage:
 *   pdf-report-merge-mcp                # after npm install -g
 *   node dist/src/bin.js                # direct invocation
 *
 * @module bin
 */

import './index.js';
