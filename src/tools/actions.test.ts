/**
 * @fileoverview Unit tests for the side-effecting audit tools
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createActionTools, formatStamp } from './actions.js';
import { ToolRegistry } from './tool-registry.js';
import { isParsedCall, parseActionLine } from '../parser/action-parser.js';
import { FakeMailTransport, createAuditDatabase } from '../testing/fakes.js';
import type { Scalar } from '../types/index.js';

const str = (value: string): Scalar => ({ kind: 'string', value });

// 2024-03-05 14:07:09 local time
const FIXED_NOW = new Date(2024, 2, 5, 14, 7, 9);

const LONG_USER_ID = '12345678901234567890';

describe('formatStamp', () => {
  it('should format local time with the chosen separator', () => {
    expect(formatStamp(FIXED_NOW)).toBe('20240305-140709');
    expect(formatStamp(FIXED_NOW, '_')).toBe('20240305_140709');
  });
});

describe('action tools', () => {
  let outputDir: string;
  let mailer: FakeMailTransport;
  let registry: ToolRegistry;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-agent-'));
    mailer = new FakeMailTransport();
    registry = new ToolRegistry(
      createActionTools({
        sql: createAuditDatabase(['alice', '42', LONG_USER_ID]),
        mailer,
        outputDir,
        sender: 'agent@audit.local',
        now: () => FIXED_NOW,
      }),
    );
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  describe('create_security_alert', () => {
    it('should write the alert as JSON and text', async () => {
      const result = await registry.execute('create_security_alert', [
        str('alice'),
        str('high'),
        str('12 failed logins at 3am'),
      ]);

      expect(result).toBe('Security alert created: ALERT-20240305-140709 (severity: HIGH)');

      const record: unknown = JSON.parse(
        await fs.readFile(path.join(outputDir, 'alerts', 'ALERT-20240305-140709.json'), 'utf-8'),
      );
      expect(record).toEqual({
        alert_id: 'ALERT-20240305-140709',
        user_id: 'alice',
        severity: 'HIGH',
        reason: '12 failed logins at 3am',
        timestamp: FIXED_NOW.toISOString(),
        status: 'OPEN',
        created_by: 'audit-agent',
      });

      const text = await fs.readFile(path.join(outputDir, 'alerts', 'ALERT-20240305-140709.txt'), 'utf-8');
      expect(text.split('\n').slice(0, 4)).toEqual(['SECURITY ALERT', '='.repeat(70), '', 'Alert ID: ALERT-20240305-140709']);
    });

    it('should accept an unquoted numeric user id', async () => {
      const result = await registry.execute('create_security_alert', [], {
        user_id: { kind: 'int', value: 42 },
        severity: str('LOW'),
        reason: str('odd hours'),
      });

      expect(result).toBe('Security alert created: ALERT-20240305-140709 (severity: LOW)');
    });

    it('should look up a 20-digit unquoted user id exactly as written', async () => {
      const call = parseActionLine(`ACTION: create_security_alert(${LONG_USER_ID}, HIGH, "x")`);
      if (!isParsedCall(call)) throw new Error('expected a call');

      const result = await registry.execute(call.toolName, call.positionalArgs, call.keywordArgs);

      expect(result).toBe('Security alert created: ALERT-20240305-140709 (severity: HIGH)');
      const record: unknown = JSON.parse(
        await fs.readFile(path.join(outputDir, 'alerts', 'ALERT-20240305-140709.json'), 'utf-8'),
      );
      expect(record).toMatchObject({ user_id: LONG_USER_ID });
    });

    it('should refuse users without audit events', async () => {
      const result = await registry.execute('create_security_alert', [str('mallory'), str('LOW'), str('x')]);

      expect(result).toBe('Cannot create alert: User mallory has no audit events.');
      await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });

    it('should reject unknown severities through the schema', async () => {
      const result = await registry.execute('create_security_alert', [str('alice'), str('SEVERE'), str('x')]);

      expect(result.startsWith('Error executing create_security_alert: severity:')).toBe(true);
    });
  });

  describe('send_email_alert', () => {
    it('should send the mail and log it', async () => {
      const result = await registry.execute('send_email_alert', [
        str('soc@audit.local'),
        str('alice'),
        str('Suspicious logins'),
        str('See alert.'),
      ]);

      expect(result).toBe('Email sent to soc@audit.local - Subject: Suspicious logins');
      expect(mailer.sent).toEqual([
        {
          from: 'agent@audit.local',
          to: 'soc@audit.local',
          subject: 'Suspicious logins',
          text: 'See alert.',
          html: undefined,
        },
      ]);

      const log = await fs.readFile(path.join(outputDir, 'email_logs', 'sent_20240305_140709.txt'), 'utf-8');
      expect(log.split('\n')[0]).toBe('To: soc@audit.local');
    });

    it('should report transport failures as text', async () => {
      const failing = new ToolRegistry(
        createActionTools({
          sql: createAuditDatabase(['alice']),
          mailer: {
            sendMail: async () => {
              throw new Error('connection refused');
            },
          },
          outputDir,
          sender: 'agent@audit.local',
        }),
      );

      const result = await failing.execute('send_email_alert', [
        str('soc@audit.local'),
        str('alice'),
        str('s'),
        str('b'),
      ]);

      expect(result).toBe('Failed to send email: connection refused');
    });
  });

  describe('generate_report', () => {
    it('should write the report files', async () => {
      const result = await registry.execute('generate_report', [str('alice'), str('Normal activity.')]);

      expect(result).toBe('Report generated: REPORT-20240305-140709');
      await expect(fs.readdir(path.join(outputDir, 'reports'))).resolves.toEqual([
        'REPORT-20240305-140709.json',
        'REPORT-20240305-140709.txt',
      ]);
    });
  });

  describe('request_manual_review', () => {
    it('should write a pending review request', async () => {
      const result = await registry.execute('request_manual_review', [], {
        user_id: str('alice'),
        urgency: str('HIGH'),
        reason: str('Privilege changes'),
      });

      expect(result).toBe('Manual review requested: REVIEW-20240305-140709 (urgency: HIGH)');

      const record: unknown = JSON.parse(
        await fs.readFile(path.join(outputDir, 'review_requests', 'REVIEW-20240305-140709.json'), 'utf-8'),
      );
      expect(record).toMatchObject({ status: 'PENDING', requested_by: 'audit-agent', user_id: 'alice' });
    });
  });
});
