/**
 * @fileoverview Side-effecting audit tools: alerts, email, reports and
 * manual-review requests.
 *
 * Every action first checks that the target user has audit events. Records
 * are written as files under the configured output directory.
 *
 * @module sql-audit-agent/tools/actions
 * @version 0.1.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { ToolDefinition } from '../types/tools.types.js';
import { IdentifierSchema, ToolKind } from '../types/tools.types.js';
import { describeError } from '../errors.js';
import { defineTool } from './define-tool.js';
import type { SqlClient } from './sql-client.js';
import type { MailTransport } from './mailer.js';
import { userExists } from './database.js';

const CREATED_BY = 'audit-agent';
const RULE = '='.repeat(70);
const THIN_RULE = '-'.repeat(70);

export interface ActionToolDeps {
  readonly sql: SqlClient;
  readonly mailer: MailTransport;

  /** Directory that holds alerts/, reports/, review_requests/ and email_logs/ */
  readonly outputDir: string;

  /** Sender address for outgoing mail */
  readonly sender: string;

  readonly now?: () => Date;
}

/**
 * Formats a local time as `yyyyMMdd<sep>HHmmss`.
 */
export function formatStamp(date: Date, separator: string = '-'): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}${separator}${time}`;
}

const SeveritySchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']));

const AlertArgsSchema = z.object({
  user_id: IdentifierSchema,
  severity: SeveritySchema,
  reason: z.string().min(1),
});

const EmailArgsSchema = z.object({
  recipient: z.string().email(),
  user_id: IdentifierSchema,
  subject: z.string().min(1),
  body_text: z.string(),
  body_html: z.string().nullish(),
});

const ReportArgsSchema = z.object({
  user_id: IdentifierSchema,
  analysis: z.string().min(1),
});

const ReviewArgsSchema = z.object({
  user_id: IdentifierSchema,
  urgency: z.string().min(1),
  reason: z.string().min(1),
});

/**
 * Creates the side-effecting tools.
 */
export function createActionTools(deps: ActionToolDeps): ToolDefinition[] {
  const now = deps.now ?? (() => new Date());
  const dir = (name: string): string => path.join(deps.outputDir, name);

  async function writeFiles(folder: string, files: Record<string, string>): Promise<void> {
    await fs.mkdir(dir(folder), { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(dir(folder), name), content, 'utf-8');
    }
  }

  return [
    defineTool({
      name: 'create_security_alert',
      kind: ToolKind.ALERT,
      description: 'Open a security alert for a user. severity: LOW/MEDIUM/HIGH/CRITICAL',
      parameters: [
        { name: 'user_id', description: 'User the alert concerns' },
        { name: 'severity', description: 'LOW, MEDIUM, HIGH or CRITICAL' },
        { name: 'reason', description: 'Evidence behind the alert' },
      ],
      schema: AlertArgsSchema,
      async execute({ user_id, severity, reason }) {
        try {
          if (!(await userExists(deps.sql, user_id))) {
            return `Cannot create alert: User ${user_id} has no audit events.`;
          }

          const timestamp = now();
          const alertId = `ALERT-${formatStamp(timestamp)}`;
          const record = {
            alert_id: alertId,
            user_id,
            severity,
            reason,
            timestamp: timestamp.toISOString(),
            status: 'OPEN',
            created_by: CREATED_BY,
          };
          const text = [
            'SECURITY ALERT',
            RULE,
            '',
            `Alert ID: ${alertId}`,
            `User ID: ${user_id}`,
            `Severity: ${severity}`,
            'Status: OPEN',
            `Created: ${timestamp.toISOString()}`,
            '',
            'REASON:',
            THIN_RULE,
            reason,
            '',
          ].join('\n');

          await writeFiles('alerts', {
            [`${alertId}.json`]: JSON.stringify(record, null, 2),
            [`${alertId}.txt`]: text,
          });
          return `Security alert created: ${alertId} (severity: ${severity})`;
        } catch (error) {
          return `Failed to create alert: ${describeError(error)}`;
        }
      },
    }),

    defineTool({
      name: 'send_email_alert',
      kind: ToolKind.EMAIL,
      description: 'Email the security team about a user.',
      parameters: [
        { name: 'recipient', description: 'Destination address' },
        { name: 'user_id', description: 'User the email concerns' },
        { name: 'subject', description: 'Subject line' },
        { name: 'body_text', description: 'Plain-text body' },
        { name: 'body_html', description: 'HTML body', optional: true },
      ],
      schema: EmailArgsSchema,
      async execute({ recipient, user_id, subject, body_text, body_html }) {
        try {
          if (!(await userExists(deps.sql, user_id))) {
            return `Cannot send email: User ${user_id} has no audit events.`;
          }

          await deps.mailer.sendMail({
            from: deps.sender,
            to: recipient,
            subject,
            text: body_text,
            html: body_html ?? undefined,
          });

          const timestamp = now();
          await writeFiles('email_logs', {
            [`sent_${formatStamp(timestamp, '_')}.txt`]: [
              `To: ${recipient}`,
              `Subject: ${subject}`,
              `Time: ${timestamp.toISOString()}`,
              'Body:',
              body_text,
              '',
            ].join('\n'),
          });
          return `Email sent to ${recipient} - Subject: ${subject}`;
        } catch (error) {
          return `Failed to send email: ${describeError(error)}`;
        }
      },
    }),

    defineTool({
      name: 'generate_report',
      kind: ToolKind.REPORT,
      description: 'Write an analysis report for a user.',
      parameters: [
        { name: 'user_id', description: 'User the report concerns' },
        { name: 'analysis', description: 'Findings' },
      ],
      schema: ReportArgsSchema,
      async execute({ user_id, analysis }) {
        try {
          if (!(await userExists(deps.sql, user_id))) {
            return `Cannot generate report: User ${user_id} has no audit events.`;
          }

          const timestamp = now();
          const reportId = `REPORT-${formatStamp(timestamp)}`;
          await writeFiles('reports', {
            [`${reportId}.json`]: JSON.stringify(
              {
                report_id: reportId,
                user_id,
                analysis,
                timestamp: timestamp.toISOString(),
                generated_by: CREATED_BY,
              },
              null,
              2,
            ),
            [`${reportId}.txt`]: [
              'SECURITY ANALYSIS REPORT',
              RULE,
              '',
              `Report ID: ${reportId}`,
              `User ID: ${user_id}`,
              `Generated: ${timestamp.toISOString()}`,
              '',
              'ANALYSIS:',
              THIN_RULE,
              analysis,
              '',
            ].join('\n'),
          });
          return `Report generated: ${reportId}`;
        } catch (error) {
          return `Failed to generate report: ${describeError(error)}`;
        }
      },
    }),

    defineTool({
      name: 'request_manual_review',
      kind: ToolKind.REVIEW,
      description: 'Ask a human analyst to review a user.',
      parameters: [
        { name: 'user_id', description: 'User to review' },
        { name: 'urgency', description: 'How soon the review is needed' },
        { name: 'reason', description: 'Why a human should look' },
      ],
      schema: ReviewArgsSchema,
      async execute({ user_id, urgency, reason }) {
        try {
          if (!(await userExists(deps.sql, user_id))) {
            return `Cannot request review: User ${user_id} has no audit events.`;
          }

          const timestamp = now();
          const requestId = `REVIEW-${formatStamp(timestamp)}`;
          await writeFiles('review_requests', {
            [`${requestId}.json`]: JSON.stringify(
              {
                request_id: requestId,
                user_id,
                urgency,
                reason,
                requested_at: timestamp.toISOString(),
                requested_by: CREATED_BY,
                status: 'PENDING',
              },
              null,
              2,
            ),
          });
          return `Manual review requested: ${requestId} (urgency: ${urgency})`;
        } catch (error) {
          return `Failed to request review: ${describeError(error)}`;
        }
      },
    }),
  ];
}
