import { z } from "zod";

const riskLevel = z.enum(["read-only", "low", "moderate", "high", "critical"]);

/**
 * Installer settings. Every key has a default so an empty or partial
 * config.yaml still yields a complete settings object.
 */
export const settingsSchema = z.object({
  paths: z.object({
    program_files: z.string().min(1).optional(),
    program_data: z.string().min(1).optional(),
    system_drive: z.string().min(1).optional(),
  }).default({}),
  host: z.object({
    edition: z.enum(["full", "constrained"]).optional(),
    build: z.number().int().positive().optional(),
  }).default({}),
  retry: z.object({
    max_attempts: z.number().int().min(1).max(20).default(5),
    base_delay_ms: z.number().int().min(0).default(1000),
  }).default({}),
  services: z.object({
    stop_grace_ms: z.number().int().min(0).default(5000),
  }).default({}),
  downloads: z.object({
    runtime_package_url: z.string().url().default("https://aka.ms/iotedged-windows-latest-cab"),
    vc_runtime_url: z.string().url().default("https://download.microsoft.com/download/0/6/4/064F84EA-D1DB-4EAA-9A5C-CC2F0FF6A638/vc_redist.x64.exe"),
    timeout_ms: z.number().int().min(1000).default(600_000),
  }).default({}),
  logs: z.object({
    provider_name: z.string().min(1).default("iotedged"),
    default_window_minutes: z.number().int().min(1).default(5),
  }).default({}),
  safety: z.object({
    confirmation_threshold: riskLevel.default("high"),
  }).default({}),
});
