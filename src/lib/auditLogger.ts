// lib/auditLogger.ts
import { Request } from "express";
import AuditLog from "../models/AuditLog";

export interface AuditEntry {
  action: string;
  details: Record<string, unknown>;
  ip?: string;
  userAgent?: string;
}

/** Receives one entry per audited action. */
export interface AuditEmitter {
  record(entry: AuditEntry): Promise<void>;
}

export const mongoAuditEmitter: AuditEmitter = {
  async record(entry) {
    await AuditLog.create(entry);
  },
};

/**
 * Request-level audit for administrative changes (governance, locks,
 * uploads). A failing audit write is logged and does not fail the request
 * that triggered it.
 */
export async function logAudit(
  req: Request,
  audit: AuditEmitter,
  { action, details = {} }: { action: string; details?: Record<string, unknown> }
) {
  const forwarded = req.headers["x-forwarded-for"];
  const ip = (Array.isArray(forwarded) ? forwarded[0] : forwarded) || req.socket.remoteAddress || req.ip;
  const userAgent = req.headers["user-agent"];

  try {
    await audit.record({ action, details, ip, userAgent });
  } catch (err) {
    console.error("Audit log failed:", err);
  }
}
