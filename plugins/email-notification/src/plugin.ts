import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import {
  ValidationError,
  definePlugin,
  type ActionOutcome,
  type CheckResult,
  type ConfigSchema,
  type PluginDefinition,
} from "@plughost/sdk";

export interface EmailConfig {
  smtpServer: string;
  smtpPort: number;
  username: string;
  password: string;
  fromEmail: string;
  useTls: boolean;
}

export interface OutgoingMail {
  from: string;
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  text?: string;
  html?: string;
}

/** The part of a nodemailer transporter this plugin uses. */
export interface MailTransport {
  sendMail(mail: OutgoingMail): Promise<{ messageId: string }>;
  close(): void;
}

export interface EmailDeps {
  createTransport?: (options: SMTPTransport.Options) => MailTransport;
}

const configSchema: ConfigSchema = {
  smtp_server: { type: "string", description: "SMTP server hostname" },
  smtp_port: { type: "integer", description: "SMTP server port", default: 587, minimum: 1, maximum: 65535 },
  username: { type: "string", description: "SMTP username" },
  password: { type: "string", description: "SMTP password" },
  from_email: { type: "string", description: "Sender address; defaults to the username" },
  use_tls: { type: "boolean", description: "Require STARTTLS", default: true },
};

const parameters: ConfigSchema = {
  to: {
    type: ["string", "array"],
    items: { type: "string" },
    description: "Recipient email address(es)",
    required: true,
  },
  cc: { type: ["string", "array"], items: { type: "string" }, description: "CC recipient email address(es)" },
  bcc: { type: ["string", "array"], items: { type: "string" }, description: "BCC recipient email address(es)" },
  subject: { type: "string", description: "Email subject line", required: true, max_length: 200 },
  body: { type: "string", description: "Plain text body" },
  html_body: { type: "string", description: "HTML body" },
};

const ADDRESS = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function toAddressList(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : typeof value === "string" ? [value] : [];
  return raw.map((entry) => String(entry).trim()).filter((entry) => entry.length > 0);
}

export function buildTransportOptions(config: EmailConfig): SMTPTransport.Options {
  const secure = config.smtpPort === 465;
  return {
    host: config.smtpServer,
    port: config.smtpPort,
    secure,
    requireTLS: !secure && config.useTls,
    auth: { user: config.username, pass: config.password },
    connectionTimeout: 5_000,
    greetingTimeout: 5_000,
    socketTimeout: 5_000,
  } satisfies SMTPTransport.Options;
}

export function createEmailNotification(deps: EmailDeps = {}): PluginDefinition<EmailConfig> {
  const createTransport: (options: SMTPTransport.Options) => MailTransport =
    deps.createTransport ?? ((options) => nodemailer.createTransport(options));
  let transport: MailTransport | null = null;

  return definePlugin<EmailConfig>({
    descriptor: {
      id: "email-notification",
      name: "Email Notification",
      version: "1.0.0",
      capabilities: ["action"],
      description: "Sends email notifications for alerts, reports and automation updates",
      tags: ["notification", "email", "alert"],
    },
    description: "Email notification action",
    configSchema,

    parseConfig(values, { demoMode }) {
      const username = text(values.username);
      const config: EmailConfig = {
        smtpServer: text(values.smtp_server),
        smtpPort: Number(values.smtp_port),
        username,
        password: text(values.password),
        fromEmail: text(values.from_email) || username,
        useTls: values.use_tls !== false,
      };
      if (!demoMode && !(config.smtpServer && config.username && config.password && config.fromEmail)) {
        throw new ValidationError("SMTP server, username, password and from_email are required outside demo mode");
      }
      return config;
    },

    async start(ctx) {
      if (ctx.demoMode) return;
      transport = createTransport(buildTransportOptions(ctx.config));
      ctx.log.info({ host: ctx.config.smtpServer, port: ctx.config.smtpPort }, "SMTP transport opened");
    },

    async stop(ctx) {
      if (!transport) return;
      transport.close();
      transport = null;
      ctx.log.info("SMTP transport closed");
    },

    async checks(ctx): Promise<Record<string, CheckResult>> {
      if (ctx.demoMode) return {};
      const observed_at = new Date().toISOString();
      return {
        "smtp-transport": transport
          ? { status: "pass", message: `${ctx.config.smtpServer}:${ctx.config.smtpPort}`, observed_at }
          : { status: "unknown", message: "Transport not open", observed_at },
      };
    },

    action: {
      parameters,

      async execute(request, ctx): Promise<ActionOutcome> {
        const { parameters: params } = request;
        const mail: OutgoingMail = {
          from: ctx.demoMode ? "demo@example.com" : ctx.config.fromEmail,
          to: toAddressList(params.to),
          cc: toAddressList(params.cc),
          bcc: toAddressList(params.bcc),
          subject: text(params.subject),
        };
        const body = text(params.body);
        const html = text(params.html_body);
        if (body) mail.text = body;
        if (html) mail.html = html;

        if (mail.to.length === 0) {
          throw new ValidationError("At least one recipient email is required");
        }
        const invalid = [...mail.to, ...mail.cc, ...mail.bcc].filter((address) => !ADDRESS.test(address));
        if (invalid.length > 0) {
          throw new ValidationError(`Invalid email address: ${invalid.join(", ")}`, invalid);
        }

        const summary = { recipients: mail.to, cc: mail.cc, bcc: mail.bcc, subject: mail.subject };

        if (ctx.demoMode) {
          ctx.log.info({ recipients: mail.to.length }, "Demo mode: email not sent");
          return {
            status: "sent",
            output: { ...summary, message_id: `<demo-${request.id}@plughost.local>`, demo_mode: true },
          };
        }

        if (!transport) {
          throw new ValidationError("SMTP transport is not open");
        }
        try {
          const info = await transport.sendMail(mail);
          ctx.log.info({ recipients: mail.to.length, message_id: info.messageId }, "Email sent");
          return { status: "sent", output: { ...summary, message_id: info.messageId, demo_mode: false } };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          ctx.log.error({ error: message }, "Failed to send email");
          return { status: "failed", error: message, output: summary };
        }
      },
    },
  });
}
