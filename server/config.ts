import fs from "fs";
import path from "path";
import { z } from "zod";
import { log } from "./log";

const adminUserSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const portalConfigSchema = z.object({
  protocol: z.enum(["http", "https"]).default("http"),
  host: z.string().default("localhost"),
  port: z.coerce.number().int().positive().default(5000),
  debug: z.boolean().default(false),
  admin_users: z.array(adminUserSchema).default([]),
});

export type AdminCredential = z.infer<typeof adminUserSchema>;

export type PortalConfig = z.infer<typeof portalConfigSchema> & {
  sessionSecret: string;
  dataDir: string;
  uploadDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PortalConfig {
  const configPath = env.PORTAL_CONFIG || path.join(process.cwd(), "config.json");

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } else {
    log(`${configPath} not found, using defaults (no static admin accounts)`, "config");
  }

  const parsed = portalConfigSchema.parse(raw);

  // Session secret validation - required in production
  const sessionSecret = env.SESSION_SECRET;
  if (env.NODE_ENV === "production" && !sessionSecret) {
    throw new Error("SESSION_SECRET environment variable is required in production");
  }

  return {
    ...parsed,
    port: env.PORT ? portalConfigSchema.shape.port.parse(env.PORT) : parsed.port,
    sessionSecret: sessionSecret || "journal-portal-dev-only-secret",
    dataDir: path.resolve(env.DATA_DIR || "data"),
    uploadDir: path.resolve(env.UPLOAD_DIR || "uploads"),
  };
}

export function baseUrl(config: Pick<PortalConfig, "protocol" | "host" | "port">): string {
  return `${config.protocol}://${config.host}:${config.port}`;
}
