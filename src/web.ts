#!/usr/bin/env node

import { WebServer } from './web-server.js';

const args = process.argv.slice(2);

let port = 3000;
let host = '127.0.0.1';
let debug = false;

for (let i = 0; i < args.length; i++) {
  if (args[i] === '-p' || args[i] === '--port') {
    port = parseInt(args[i + 1], 10);
    i++;
  } else if (args[i] === '--host') {
    host = args[i + 1];
    i++;
  } else if (args[i] === '--debug') {
    debug = true;
  } else if (args[i] === '-h' || args[i] === '--help') {
    console.log(`
textlens-web - JSON API for text statistics

Usage: textlens-web [options]

Options:
  -p, --port <port>    Port to listen on (default: 3000)
  --host <host>        Interface to bind (default: 127.0.0.1)
  --debug              Log every event to stderr
  -h, --help           Show this help

Endpoints:
  GET  /health         Service status
  POST /api/clean      {"url": "https://.../book.txt"} -> cleaned text, statistics, summary
  POST /api/analyze    {"text": "..."} -> statistics
  GET  /api/debug      Recent events
`);
    process.exit(0);
  }
}

if (isNaN(port) || port < 0 || port > 65535) {
  console.error('\n❌ Port must be a number between 0 and 65535\n');
  process.exit(1);
}

const server = new WebServer({ port, host, debug });

server.start()
  .then(() => {
    const address = server.address();
    console.log(`\n📖 textlens API running at http://${host}:${address?.port ?? port}`);
    console.log(`\nPress Ctrl+C to stop\n`);
  })
  .catch((err: unknown) => {
    console.error(`\n❌ Could not start server: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
