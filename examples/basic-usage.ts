/**
 * @fileoverview Offline walkthrough of an audit run.
 *
 * The model is scripted and the database, mail server and output directory
 * are in-process stand-ins, so this runs without credentials or a network.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ConversationLoop,
  MemoryTransport,
  ScriptedBackend,
  Severity,
  StepReporter,
  TerminalSink,
  ToolRegistry,
  buildSystemPrompt,
  createAuditTools,
  createLogger,
  ConsoleTransport,
  type SqlResult,
} from '../src/index.js';
import { FakeMailTransport, FakeSqlClient } from '../src/testing/fakes.js';

// ============ Stand-ins ============

const FAILURES: SqlResult = {
  columns: ['user_id', 'total', 'failures'],
  rows: [
    ['u-104', 40, 31],
    ['u-007', 52, 2],
  ],
};

const sql = new FakeSqlClient((text) => {
  if (text.includes('information_schema.columns')) {
    return {
      columns: ['column_name', 'data_type', 'is_nullable'],
      rows: [
        ['user_id', 'text', 'NO'],
        ['status', 'text', 'NO'],
        ['timestamp', 'timestamp without time zone', 'NO'],
      ],
    };
  }
  if (text.includes('FROM audit_events WHERE user_id')) {
    return { columns: ['?column?'], rows: [[1]] };
  }
  if (text.includes('GROUP BY user_id')) {
    return FAILURES;
  }
  return { columns: [], rows: [] };
});

const model = new ScriptedBackend([
  [
    'Thought: I need the columns, then failure counts per user.',
    'ACTION: get_table_schema(audit_events)',
    `ACTION: query_postgres(query="SELECT user_id, COUNT(*) as total, COUNT(CASE WHEN status='FAILURE' THEN 1 END) as failures FROM audit_events GROUP BY user_id ORDER BY failures DESC LIMIT 20")`,
  ].join('\n'),
  [
    'Thought: u-104 fails 31 of 40 events. Raise an alert.',
    'ACTION: create_security_alert(user_id="u-104", severity=HIGH, reason="31 of 40 events failed")',
  ].join('\n'),
  [
    'Thought: The alert is open and no other user stands out.',
    'FINAL ANSWER: u-104 shows a 77% failure rate and has a HIGH alert. Other users look normal.',
  ].join('\n'),
]);

// ============ Run ============

async function main(): Promise<void> {
  const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-demo-'));
  const logs = new MemoryTransport();
  const logger = createLogger('example', {
    minLevel: Severity.INFO,
    transports: [new ConsoleTransport(), logs],
  });

  const registry = new ToolRegistry(
    createAuditTools({ sql, mailer: new FakeMailTransport(), outputDir, sender: 'agent@audit.local' }),
    logger.child({ module: 'tools.registry' }),
  );
  const reporter = new StepReporter([new TerminalSink()]);
  reporter.on('event', (event) => {
    if (event.type === 'step') {
      console.log(`Step ${event.step}: ${event.thought}`);
      for (const call of event.tools) {
        console.log(`  ${call.tool} -> ${call.result.split('\n')[0] ?? ''}`);
      }
    }
  });

  const loop = new ConversationLoop({
    model,
    registry,
    reporter,
    systemPrompt: buildSystemPrompt(registry),
    logger: logger.child({ module: 'agent.loop' }),
  });

  const outcome = await loop.run('Are there suspicious users?');

  console.log(`Status: ${outcome.status}, steps: ${outcome.steps.length}, log entries: ${logs.getEntries().length}`);
  console.log(`Alerts written: ${(await fs.readdir(path.join(outputDir, 'alerts'))).join(', ')}`);

  await fs.rm(outputDir, { recursive: true, force: true });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
