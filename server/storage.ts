import crypto from "crypto";
import { z } from "zod";
import {
  DEFAULT_WIDGETS,
  announcementSchema,
  assetSchema,
  calendarEventSchema,
  departmentSchema,
  journalSchema,
  roleSchema,
  rulesSchema,
  siteSettingsSchema,
  studentSchema,
  ticketSchema,
  userSchema,
  type Announcement,
  type Asset,
  type CalendarEvent,
  type Department,
  type Journal,
  type Role,
  type Rules,
  type SiteSettings,
  type Student,
  type Ticket,
  type User,
  type Widget,
} from "../shared/schema";
import { Collection, type DocumentStore } from "./lib/document-store";
import { fail, ok, type ServiceResult } from "./lib/result";
import { SEED_ROLES } from "./lib/roles";
import { normalizeWidgets } from "./lib/widgets";

export const DEFAULT_RULES: Rules = {
  content: "Defina aqui as regras de convivência do jornal.",
  updated_at: null,
};

export const DEFAULT_SITE_SETTINGS: SiteSettings = {
  logo_url: "",
  primary_color: "#0d6efd",
  accent_color: "#6610f2",
  tagline: "Painel interno do jornal escolar",
  onboarding_done: false,
  widgets: DEFAULT_WIDGETS,
};

export interface PortalCollections {
  students: Collection<Student[]>;
  journals: Collection<Journal[]>;
  assets: Collection<Asset[]>;
  rules: Collection<Rules>;
  announcements: Collection<Announcement[]>;
  calendar: Collection<CalendarEvent[]>;
  departments: Collection<Department[]>;
  siteSettings: Collection<SiteSettings>;
  roles: Collection<Role[]>;
  users: Collection<User[]>;
  tickets: Collection<Ticket[]>;
}

/** One document per collection, instantiated once per process. */
export function createCollections(store: DocumentStore): PortalCollections {
  return {
    students: new Collection<Student[]>(store, "students", z.array(studentSchema), () => []),
    journals: new Collection<Journal[]>(store, "journals", z.array(journalSchema), () => []),
    assets: new Collection<Asset[]>(store, "assets", z.array(assetSchema), () => []),
    rules: new Collection<Rules>(store, "rules", rulesSchema, () => ({ ...DEFAULT_RULES })),
    announcements: new Collection<Announcement[]>(store, "announcements", z.array(announcementSchema), () => []),
    calendar: new Collection<CalendarEvent[]>(store, "calendar", z.array(calendarEventSchema), () => []),
    departments: new Collection<Department[]>(store, "departments", z.array(departmentSchema), () => []),
    siteSettings: new Collection<SiteSettings>(store, "site_settings", siteSettingsSchema, () => ({
      ...DEFAULT_SITE_SETTINGS,
    })),
    roles: new Collection<Role[]>(store, "roles", z.array(roleSchema), () => SEED_ROLES.map((r) => ({ ...r }))),
    users: new Collection<User[]>(store, "users", z.array(userSchema), () => []),
    tickets: new Collection<Ticket[]>(store, "tickets", z.array(ticketSchema), () => []),
  };
}

export interface InsertStudent {
  name: string;
  role: string;
  contact: string;
  notes: string;
  portalEnabled: boolean;
}

export interface InsertJournal {
  title: string;
  edition: string;
  releaseDate: string;
  description: string;
  file: string | null;
}

export interface InsertAsset {
  originalName: string;
  storedName: string;
  notes: string;
  owner: string;
  departmentId: string | null;
}

export interface InsertAnnouncement {
  title: string;
  body: string;
  audience: string;
  pinned: boolean;
}

export interface InsertCalendarEvent {
  title: string;
  date: string;
  category: string;
  departmentId: string | null;
  description: string;
}

export interface VisualSettings {
  logoUrl: string;
  primaryColor: string;
  accentColor: string;
  tagline?: string;
}

export type JournalDecision = "approve" | "reject";

export interface IStorage {
  // Students
  getAllStudents(): Promise<Student[]>;
  createStudent(student: InsertStudent): Promise<Student>;
  toggleStudent(id: string): Promise<ServiceResult<Student>>;

  // Journals
  getAllJournals(): Promise<Journal[]>;
  getJournalByToken(token: string): Promise<Journal | undefined>;
  createJournal(journal: InsertJournal): Promise<Journal>;
  decideJournal(token: string, action: JournalDecision, reason?: string): Promise<ServiceResult<Journal>>;

  // Assets
  getAllAssets(): Promise<Asset[]>;
  createAsset(asset: InsertAsset): Promise<Asset>;

  // Rules
  getRules(): Promise<Rules>;
  updateRules(content: string): Promise<Rules>;

  // Announcements
  getAllAnnouncements(): Promise<Announcement[]>;
  createAnnouncement(announcement: InsertAnnouncement): Promise<Announcement>;
  removeAnnouncement(id: string): Promise<boolean>;

  // Calendar
  getAllEvents(): Promise<CalendarEvent[]>;
  createEvent(event: InsertCalendarEvent): Promise<CalendarEvent>;

  // Site settings
  getSiteSettings(): Promise<SiteSettings>;
  getWidgets(): Promise<Widget[]>;
  updateVisualSettings(settings: VisualSettings): Promise<SiteSettings>;
  updateWidgets(edit: (current: Widget[]) => Widget[]): Promise<Widget[]>;
  completeOnboarding(): Promise<SiteSettings>;
}

const byName = (a: { name: string }, b: { name: string }) =>
  a.name.toLowerCase().localeCompare(b.name.toLowerCase());

export class JsonStorage implements IStorage {
  constructor(private readonly collections: PortalCollections) {}

  // Students
  async getAllStudents(): Promise<Student[]> {
    const students = await this.collections.students.read();
    return students.sort(byName);
  }

  createStudent(data: InsertStudent): Promise<Student> {
    return this.collections.students.mutate((students) => {
      const student: Student = {
        id: crypto.randomUUID(),
        name: data.name,
        role: data.role,
        contact: data.contact,
        notes: data.notes,
        portal_enabled: data.portalEnabled,
        created_at: new Date().toISOString(),
      };
      students.push(student);
      return student;
    });
  }

  toggleStudent(id: string): Promise<ServiceResult<Student>> {
    return this.collections.students.mutate((students) => {
      const student = students.find((s) => s.id === id);
      if (!student) return fail<Student>("not_found", "Participante não encontrado");
      student.portal_enabled = !student.portal_enabled;
      return ok(student);
    });
  }

  // Journals
  async getAllJournals(): Promise<Journal[]> {
    const journals = await this.collections.journals.read();
    return journals.sort((a, b) => b.release_date.localeCompare(a.release_date));
  }

  async getJournalByToken(token: string): Promise<Journal | undefined> {
    const journals = await this.collections.journals.read();
    return journals.find((j) => j.approval_token === token);
  }

  createJournal(data: InsertJournal): Promise<Journal> {
    return this.collections.journals.mutate((journals) => {
      const journal: Journal = {
        id: crypto.randomUUID(),
        title: data.title,
        edition: data.edition,
        release_date: data.releaseDate,
        description: data.description,
        file: data.file,
        status: "pendente",
        approval_reason: null,
        approval_token: crypto.randomUUID(),
        created_at: new Date().toISOString(),
      };
      journals.push(journal);
      return journal;
    });
  }

  /** The approval link stays valid, so a reviewer may revise an earlier decision. */
  decideJournal(token: string, action: JournalDecision, reason?: string): Promise<ServiceResult<Journal>> {
    return this.collections.journals.mutate((journals) => {
      const journal = journals.find((j) => j.approval_token === token);
      if (!journal) return fail<Journal>("not_found", "Solicitação não encontrada");

      if (action === "approve") {
        journal.status = "aprovado";
        journal.approval_reason = null;
      } else {
        journal.status = "rejeitado";
        journal.approval_reason = reason || "Sem justificativa";
      }
      return ok(journal);
    });
  }

  // Assets
  async getAllAssets(): Promise<Asset[]> {
    const assets = await this.collections.assets.read();
    return assets.sort((a, b) => b.uploaded_at.localeCompare(a.uploaded_at));
  }

  createAsset(data: InsertAsset): Promise<Asset> {
    return this.collections.assets.mutate((assets) => {
      const asset: Asset = {
        id: crypto.randomUUID(),
        original_name: data.originalName,
        stored_name: data.storedName,
        notes: data.notes,
        owner: data.owner,
        department_id: data.departmentId,
        scope: data.departmentId ? "departamento" : "pessoal",
        uploaded_at: new Date().toISOString(),
      };
      assets.push(asset);
      return asset;
    });
  }

  // Rules
  getRules(): Promise<Rules> {
    return this.collections.rules.read();
  }

  updateRules(content: string): Promise<Rules> {
    return this.collections.rules.mutate((rules) => {
      rules.content = content;
      rules.updated_at = new Date().toISOString();
      return rules;
    });
  }

  // Announcements
  async getAllAnnouncements(): Promise<Announcement[]> {
    const announcements = await this.collections.announcements.read();
    return announcements.sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  createAnnouncement(data: InsertAnnouncement): Promise<Announcement> {
    return this.collections.announcements.mutate((announcements) => {
      const announcement: Announcement = {
        id: crypto.randomUUID(),
        title: data.title,
        body: data.body,
        audience: data.audience || "todos",
        pinned: data.pinned,
        created_at: new Date().toISOString(),
      };
      announcements.push(announcement);
      return announcement;
    });
  }

  removeAnnouncement(id: string): Promise<boolean> {
    return this.collections.announcements.mutate((announcements) => {
      const index = announcements.findIndex((a) => a.id === id);
      if (index < 0) return false;
      announcements.splice(index, 1);
      return true;
    });
  }

  // Calendar
  async getAllEvents(): Promise<CalendarEvent[]> {
    const events = await this.collections.calendar.read();
    return events.sort((a, b) => a.date.localeCompare(b.date));
  }

  createEvent(data: InsertCalendarEvent): Promise<CalendarEvent> {
    return this.collections.calendar.mutate((events) => {
      const event: CalendarEvent = {
        id: crypto.randomUUID(),
        title: data.title,
        date: data.date,
        category: data.category || "geral",
        department_id: data.departmentId,
        description: data.description,
      };
      events.push(event);
      return event;
    });
  }

  // Site settings
  getSiteSettings(): Promise<SiteSettings> {
    return this.collections.siteSettings.read();
  }

  async getWidgets(): Promise<Widget[]> {
    const settings = await this.collections.siteSettings.read();
    return normalizeWidgets(settings.widgets);
  }

  updateVisualSettings(data: VisualSettings): Promise<SiteSettings> {
    return this.collections.siteSettings.mutate((settings) => {
      settings.logo_url = data.logoUrl;
      settings.primary_color = data.primaryColor || "#0d6efd";
      settings.accent_color = data.accentColor || "#6610f2";
      settings.tagline = data.tagline ?? settings.tagline;
      return settings;
    });
  }

  /** `edit` receives the normalized widgets; its result is stored in the same cycle. */
  updateWidgets(edit: (current: Widget[]) => Widget[]): Promise<Widget[]> {
    return this.collections.siteSettings.mutate((settings) => {
      const widgets = edit(normalizeWidgets(settings.widgets));
      settings.widgets = widgets;
      return widgets;
    });
  }

  completeOnboarding(): Promise<SiteSettings> {
    return this.collections.siteSettings.mutate((settings) => {
      settings.onboarding_done = true;
      return settings;
    });
  }
}
