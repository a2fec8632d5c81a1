import { z } from "zod";

// Permission tokens
export const PERMISSIONS = [
  "manage_students",
  "manage_journals",
  "manage_assets",
  "manage_rules",
  "manage_announcements",
  "manage_calendar",
  "manage_departments",
  "approve_departments",
  "manage_settings",
  "manage_roles",
  "manage_users",
  "manage_tickets",
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const ADMIN_ROLE_NAME = "Administrador";

export const queueStatusEnum = z.enum(["pendente", "aprovado", "rejeitado"]);
export const journalStatusEnum = z.enum(["pendente", "aprovado", "rejeitado"]);
export const ticketStatusEnum = z.enum(["aberto", "fechado"]);
export const assetScopeEnum = z.enum(["pessoal", "departamento"]);
export const widgetTypeEnum = z.enum(["text", "metric", "event"]);

// Older documents may carry null where a form field was left out
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const timestamp = z.string();

// Roles
export const roleSchema = z.object({
  name: z.string(),
  description: text,
  permissions: z.array(z.string()).default([]),
});

// Portal users
export const userSchema = z.object({
  id: z.string(),
  name: text,
  username: z.string(),
  password_hash: z.string(),
  role: z.string(),
  portal_enabled: z.boolean().default(true),
  created_at: timestamp,
});

// Departments
export const queueRequestSchema = z.object({
  id: z.string(),
  name: text,
  contact: text,
  desired_role: text,
  motivation: text,
  status: queueStatusEnum,
  created_at: timestamp,
  decided_by: z.string().optional(),
  decided_at: timestamp.optional(),
});

export const memberSchema = z.object({
  name: text,
  role: text,
  joined_at: timestamp,
});

export const departmentSchema = z.object({
  id: z.string(),
  name: text,
  description: text,
  director: text,
  join_token: z.string(),
  members: z.array(memberSchema).default([]),
  queue: z.array(queueRequestSchema).default([]),
});

// Tickets
export const ticketMessageSchema = z.object({
  author: z.string(),
  role: text,
  body: text,
  timestamp,
});

export const ticketSchema = z.object({
  id: z.string(),
  title: text,
  reason: text,
  urgency: z.string().default("normal"),
  status: ticketStatusEnum,
  created_by: z.string(),
  created_role: text,
  messages: z.array(ticketMessageSchema).default([]),
  created_at: timestamp,
});

// Staff records
export const studentSchema = z.object({
  id: z.string(),
  name: text,
  role: text,
  contact: text,
  notes: text,
  portal_enabled: z.boolean().default(false),
  created_at: timestamp,
});

export const journalSchema = z.object({
  id: z.string(),
  title: text,
  edition: text,
  release_date: text,
  description: text,
  file: z.string().nullable().default(null),
  status: journalStatusEnum,
  approval_reason: z.string().nullable().default(null),
  approval_token: z.string(),
  created_at: timestamp,
});

export const assetSchema = z.object({
  id: z.string(),
  original_name: z.string(),
  stored_name: z.string(),
  notes: text,
  owner: text,
  department_id: z.string().nullable().default(null),
  scope: assetScopeEnum.default("pessoal"),
  uploaded_at: timestamp,
});

export const rulesSchema = z.object({
  content: text,
  updated_at: z.string().nullable().default(null),
});

export const announcementSchema = z.object({
  id: z.string(),
  title: text,
  body: text,
  audience: z.string().default("todos"),
  pinned: z.boolean().default(false),
  created_at: timestamp,
});

export const calendarEventSchema = z.object({
  id: z.string(),
  title: text,
  date: text,
  category: z.string().default("geral"),
  department_id: z.string().nullable().default(null),
  description: text,
});

// Dashboard widgets and visual settings
export const widgetSchema = z.object({
  id: z.string(),
  title: text,
  enabled: z.boolean().default(true),
  type: widgetTypeEnum,
  subtitle: text,
  content: z.string().optional(),
});

// Stored widgets may be partial overrides of a default widget
export const storedWidgetSchema = widgetSchema.partial();

export const siteSettingsSchema = z.object({
  logo_url: text,
  primary_color: z.string().default("#0d6efd"),
  accent_color: z.string().default("#6610f2"),
  tagline: z.string().default("Painel interno do jornal escolar"),
  onboarding_done: z.boolean().default(false),
  widgets: z.array(storedWidgetSchema).optional(),
});

// Session identity
export const principalSchema = z.object({
  username: z.string(),
  role: z.string(),
  permissions: z.array(z.string()),
});

// Types
export type Role = z.infer<typeof roleSchema>;
export type User = z.infer<typeof userSchema>;
export type QueueRequest = z.infer<typeof queueRequestSchema>;
export type Member = z.infer<typeof memberSchema>;
export type Department = z.infer<typeof departmentSchema>;
export type TicketMessage = z.infer<typeof ticketMessageSchema>;
export type Ticket = z.infer<typeof ticketSchema>;
export type Student = z.infer<typeof studentSchema>;
export type Journal = z.infer<typeof journalSchema>;
export type Asset = z.infer<typeof assetSchema>;
export type Rules = z.infer<typeof rulesSchema>;
export type Announcement = z.infer<typeof announcementSchema>;
export type CalendarEvent = z.infer<typeof calendarEventSchema>;
export type Widget = z.infer<typeof widgetSchema>;
export type StoredWidget = z.infer<typeof storedWidgetSchema>;
export type SiteSettings = z.infer<typeof siteSettingsSchema>;
export type Principal = z.infer<typeof principalSchema>;

// Extended types for the dashboard
export type UserSummary = Omit<User, "password_hash">;

export type WidgetCard = Widget & {
  value?: string | number;
  helper?: string;
};

export type QueueDecision = "approve" | "reject";

export const TICKET_REASONS = [
  "Problema técnico",
  "Solicitação de acesso",
  "Orientação de conteúdo",
  "Conflito de agenda",
  "Outro",
] as const;

export const DEFAULT_WIDGETS: Widget[] = [
  {
    id: "welcome",
    title: "Boas-vindas",
    enabled: true,
    type: "text",
    subtitle: "Orientação rápida",
    content: "Use as guias para organizar o jornal e mantenha as permissões em dia.",
  },
  {
    id: "students",
    title: "Equipe ativa",
    enabled: true,
    type: "metric",
    subtitle: "Fichas cadastradas",
  },
  {
    id: "tickets",
    title: "Tickets abertos",
    enabled: true,
    type: "metric",
    subtitle: "Chamados aguardando resposta",
  },
  {
    id: "agenda",
    title: "Próximo evento",
    enabled: true,
    type: "event",
    subtitle: "Calendário geral",
  },
  {
    id: "departments",
    title: "Filas de departamentos",
    enabled: true,
    type: "metric",
    subtitle: "Pedidos para aprovar",
  },
];
