#!/usr/bin/env node
/**
 * OCR Accuracy MCP Server - CLI Entry Point
 *
 * This file serves as the bin entry point for global npm installation.
 * It simply imports and runs the main server module.
 *
 * Usage:
 *   ocr-accuracy-mcp                    # after npm install -g
 *   node dist/src/index.js              # direct invocation
 *
 * @module bin
 */

import './index.js';
