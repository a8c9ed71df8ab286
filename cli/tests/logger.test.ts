/**
 * Tests for logging utilities
 */
import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  formatLogLine,
  logError,
  logInfo,
  logWarn,
  resolveLogPath,
  scopedLogger,
  setLogFile,
  setLogLevel,
  setLogSink
} from '../lib/logger.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

test('formatLogLine: timestamp, level, message, context', () => {
  assert.equal(formatLogLine('warn', 'hello', { a: 1 }, NOW), '[2024-05-01T10:00:00.000Z] [WARN] hello {"a":1}');
  assert.equal(formatLogLine('info', 'plain', {}, NOW), '[2024-05-01T10:00:00.000Z] [INFO] plain');
});

test('level filtering', () => {
  const lines: string[] = [];
  setLogSink(line => lines.push(line));
  setLogLevel('warn');
  try {
    logInfo('dropped');
    logWarn('kept warn');
    logError('kept error');
  } finally {
    setLogLevel('info');
    setLogSink(null);
  }
  assert.equal(lines.length, 2);
  assert.ok(lines[0].endsWith('[WARN] kept warn'));
  assert.ok(lines[1].endsWith('[ERROR] kept error'));
});

test('scopedLogger: prefixes messages', () => {
  const lines: string[] = [];
  setLogSink(line => lines.push(line));
  try {
    scopedLogger('Weather').info('initialized', { version: '1.0' });
  } finally {
    setLogSink(null);
  }
  assert.ok(lines[0].endsWith('[INFO] [Weather]: initialized {"version":"1.0"}'));
});

test('resolveLogPath: {date} placeholder', () => {
  assert.equal(resolveLogPath('logs/{date}.log', NOW), 'logs/2024-05-01.log');
  assert.equal(resolveLogPath('glance.log', NOW), 'glance.log');
});

test('setLogFile: appends lines to the file, creating its directory', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'glance-log-'));
  const file = path.join(dir, 'nested', 'glance.log');
  try {
    setLogFile(file);
    logError('boom');
    logInfo('second');
    const lines = fs.readFileSync(file, 'utf8').split('\n');
    assert.equal(lines.length, 3);
    assert.ok(lines[0].endsWith('[ERROR] boom'));
    assert.ok(lines[1].endsWith('[INFO] second'));
    assert.equal(lines[2], '');
  } finally {
    setLogFile(null);
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
