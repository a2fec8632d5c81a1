import type { Express, Request, Response, NextFunction } from "express";
import type { Server } from "http";
import session from "express-session";
import { z } from "zod";
import { hasPermission } from "./lib/guard";
import { isAllowedFile } from "./lib/blob-store";
import { pendingCount } from "./lib/department-queue";
import { applyWidgetForm, buildWidgetCards } from "./lib/widgets";
import { baseUrl } from "./config";
import {
  currentPrincipal,
  flash,
  flashError,
  principalOf,
  requireAuth,
  requirePermission,
  safeRedirect,
  takeFlash,
} from "./auth";
import { ALLOWED_ASSET_EXTENSIONS, ALLOWED_JOURNAL_EXTENSIONS, acceptUpload } from "./uploads";
import { DEFAULT_SITE_SETTINGS } from "./storage";
import type { Portal } from "./portal";
import type { PageContext } from "./views/html";
import { parseTab, renderDashboard, renderWelcome } from "./views/dashboard";
import { renderApplyDepartment, renderError, renderJournalApproval, renderLogin } from "./views/public";

// Form fields
const field = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (Array.isArray(value) ? value[0] ?? "" : value ?? "").trim());

const requiredField = (message: string) => field.pipe(z.string().min(1, message));

const checkbox = field.transform((value) => value === "on");

const multiField = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const loginSchema = z.object({
  username: field,
  password: z.string().default(""),
});

const studentSchema = z.object({
  name: requiredField("Informe o nome do participante"),
  role: field,
  contact: field,
  notes: field,
  portal_enabled: checkbox,
  redirect_to: field,
});

const journalSchema = z.object({
  title: requiredField("Informe o título do jornal"),
  edition: field,
  release_date: field,
  description: field,
});

const assetSchema = z.object({
  notes: field,
  owner: field,
  department_id: field,
  redirect_to: field,
});

const rulesSchema = z.object({ content: field });

const announcementSchema = z.object({
  title: requiredField("Informe o título da mensagem"),
  body: field,
  audience: field,
  pinned: checkbox,
  redirect_to: field,
});

const calendarSchema = z.object({
  title: requiredField("Informe o nome do evento"),
  date: field,
  category: field,
  department_id: field,
  description: field,
  redirect_to: field,
});

const ticketSchema = z.object({
  title: requiredField("Informe o assunto do ticket"),
  reason: field,
  custom_reason: field,
  urgency: field,
  message: requiredField("Descreva o pedido"),
});

const messageSchema = z.object({ message: field });

const departmentSchema = z.object({
  name: requiredField("Informe o nome do departamento"),
  description: field,
  director: field,
  redirect_to: field,
});

const memberSchema = z.object({
  name: requiredField("Informe o nome do membro"),
  role: field,
});

const applySchema = z.object({
  name: requiredField("Informe seu nome"),
  contact: field,
  desired_role: field,
  motivation: field,
});

const roleSchema = z.object({
  name: requiredField("Informe o nome do cargo"),
  description: field,
  permissions: multiField,
  redirect_to: field,
});

const userSchema = z.object({
  name: field,
  username: requiredField("Informe o usuário"),
  password: z.string({ required_error: "Informe a senha" }).min(1, "Informe a senha"),
  role: requiredField("Cargo inválido"),
  portal_enabled: checkbox,
  redirect_to: field,
});

const userRoleSchema = z.object({ role: field, redirect_to: field });

const visualSettingsSchema = z.object({
  logo_url: field,
  primary_color: field,
  accent_color: field,
  tagline: z.string().optional(),
});

const approvalSchema = z.object({
  action: field,
  reason: field,
});

const widgetFormSchema = z.record(z.string(), field);

const queueActionSchema = z.enum(["approve", "reject"]);

/** Parses a form body; on failure flashes the first issue and redirects back. */
function readForm<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response,
  back: string,
): z.output<T> | undefined {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    flash(req, result.error.errors[0]?.message ?? "Formulário inválido", "danger");
    res.redirect(back);
    return undefined;
  }
  return result.data;
}

function sendErrorPage(req: Request, res: Response, status: number, message: string) {
  const ctx: PageContext = {
    settings: DEFAULT_SITE_SETTINGS,
    principal: currentPrincipal(req),
    flashes: [],
  };
  res.status(status).type("html").send(renderError(ctx, status, message));
}

function serverError(req: Request, res: Response, label: string, error: unknown) {
  console.error(`Error ${label}:`, error);
  sendErrorPage(req, res, 500, "Erro interno do servidor");
}

export async function registerRoutes(httpServer: Server, app: Express, portal: Portal): Promise<Server> {
  const { config, storage, identity, roles, departments, tickets } = portal;

  app.use(
    session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        secure: config.protocol === "https",
        httpOnly: true,
        sameSite: "lax",
        maxAge: 24 * 60 * 60 * 1000,
      },
    })
  );

  async function pageContext(req: Request): Promise<PageContext> {
    return {
      settings: await storage.getSiteSettings(),
      principal: currentPrincipal(req),
      flashes: takeFlash(req),
    };
  }

  // ==================== AUTH ROUTES ====================

  app.get("/", (req, res) => {
    res.redirect(currentPrincipal(req) ? "/dashboard" : "/login");
  });

  app.get("/login", async (req, res) => {
    try {
      if (currentPrincipal(req)) {
        return res.redirect("/dashboard");
      }
      res.send(renderLogin(await pageContext(req)));
    } catch (error) {
      serverError(req, res, "rendering login", error);
    }
  });

  app.post("/login", async (req, res) => {
    try {
      const form = loginSchema.parse(req.body ?? {});
      const result = await identity.authenticate(form.username, form.password);
      if (!result.ok) {
        flash(req, "Usuário ou senha inválidos ou acesso bloqueado", "danger");
        return res.redirect("/login");
      }
      req.session.principal = result.principal;
      flash(req, "Login realizado com sucesso", "success");
      res.redirect("/dashboard");
    } catch (error) {
      serverError(req, res, "during login", error);
    }
  });

  app.get("/logout", (req, res) => {
    delete req.session.principal;
    flash(req, "Sessão encerrada", "info");
    res.redirect("/login");
  });

  // ==================== ONBOARDING ====================

  app.get("/welcome", requirePermission("manage_settings"), async (req, res) => {
    try {
      const [departmentList, users, roleList] = await Promise.all([
        departments.list(),
        identity.listUsers(),
        roles.listRoles(),
      ]);
      res.send(
        renderWelcome(await pageContext(req), { departments: departmentList, users, roles: roleList }),
      );
    } catch (error) {
      serverError(req, res, "rendering welcome", error);
    }
  });

  app.post("/welcome/complete", requirePermission("manage_settings"), async (req, res) => {
    try {
      const [departmentList, users] = await Promise.all([departments.list(), identity.listUsers()]);
      if (departmentList.length === 0 || users.length === 0) {
        flash(req, "Crie ao menos um departamento e um usuário para finalizar", "warning");
        return res.redirect("/welcome");
      }
      await storage.completeOnboarding();
      flash(req, "Configuração inicial concluída!", "success");
      res.redirect("/dashboard");
    } catch (error) {
      serverError(req, res, "completing onboarding", error);
    }
  });

  // ==================== DASHBOARD ====================

  app.get("/dashboard", requireAuth, async (req, res) => {
    try {
      const principal = principalOf(req);
      const settings = await storage.getSiteSettings();
      // Only principals who can finish onboarding are sent to it
      if (!settings.onboarding_done && hasPermission(principal, "manage_settings")) {
        return res.redirect("/welcome");
      }

      const [
        students,
        journals,
        assets,
        rules,
        announcements,
        events,
        departmentList,
        users,
        roleList,
        allPermissions,
        visibleTickets,
        openTickets,
        widgetConfig,
      ] = await Promise.all([
        storage.getAllStudents(),
        storage.getAllJournals(),
        storage.getAllAssets(),
        storage.getRules(),
        storage.getAllAnnouncements(),
        storage.getAllEvents(),
        departments.list(),
        identity.listUsers(),
        roles.listRoles(),
        roles.allPermissions(),
        tickets.visibleTo(principal),
        tickets.openCount(),
        storage.getWidgets(),
      ]);

      const widgetCards = buildWidgetCards(widgetConfig, {
        activeStudents: students.length,
        openTickets,
        pendingQueue: pendingCount(departmentList),
        events,
      });

      res.send(
        renderDashboard(await pageContext(req), {
          tab: parseTab(req.query.tab),
          baseUrl: baseUrl(config),
          students,
          journals,
          assets,
          rules,
          announcements,
          events,
          departments: departmentList,
          users,
          roles: roleList,
          allPermissions,
          tickets: visibleTickets,
          widgetCards,
          widgetConfig,
        }),
      );
    } catch (error) {
      serverError(req, res, "rendering dashboard", error);
    }
  });

  // ==================== STUDENTS ====================

  app.post("/students", requirePermission("manage_students"), async (req, res) => {
    try {
      const back = "/dashboard?tab=students";
      const form = readForm(studentSchema, req, res, back);
      if (!form) return;

      await storage.createStudent({
        name: form.name,
        role: form.role,
        contact: form.contact,
        notes: form.notes,
        portalEnabled: form.portal_enabled,
      });
      flash(req, "Ficha de participante criada", "success");
      res.redirect(safeRedirect(form.redirect_to, back));
    } catch (error) {
      serverError(req, res, "creating student", error);
    }
  });

  app.post("/students/:id/toggle", requirePermission("manage_students"), async (req, res) => {
    try {
      const result = await storage.toggleStudent(req.params.id);
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Permissão de portal atualizada", "info");
      }
      res.redirect("/dashboard?tab=students");
    } catch (error) {
      serverError(req, res, "toggling student", error);
    }
  });

  // ==================== JOURNALS ====================

  app.post(
    "/journals",
    requirePermission("manage_journals"),
    acceptUpload("file", "/dashboard?tab=journals"),
    async (req, res) => {
      try {
        const back = "/dashboard?tab=journals";
        const form = readForm(journalSchema, req, res, back);
        if (!form) return;

        let file: string | null = null;
        if (req.file && req.file.originalname) {
          if (!isAllowedFile(req.file.originalname, ALLOWED_JOURNAL_EXTENSIONS)) {
            flash(req, "Formato não permitido. Envie apenas PDF.", "danger");
            return res.redirect(back);
          }
          file = await portal.journalFiles.store(req.file.buffer, req.file.originalname);
        }

        await storage.createJournal({
          title: form.title,
          edition: form.edition,
          releaseDate: form.release_date,
          description: form.description,
          file,
        });
        flash(req, "Jornal enviado para aprovação", "success");
        res.redirect(back);
      } catch (error) {
        serverError(req, res, "creating journal", error);
      }
    },
  );

  app.get("/approve/:token", async (req, res) => {
    try {
      const journal = await storage.getJournalByToken(req.params.token);
      if (!journal) {
        flash(req, "Solicitação não encontrada", "danger");
        return res.redirect("/login");
      }
      res.send(renderJournalApproval(await pageContext(req), journal));
    } catch (error) {
      serverError(req, res, "rendering journal approval", error);
    }
  });

  app.post("/approve/:token", async (req, res) => {
    try {
      const token = req.params.token;
      const form = approvalSchema.parse(req.body ?? {});
      const action = form.action === "approve" || form.action === "reject" ? form.action : undefined;

      if (action) {
        const result = await storage.decideJournal(token, action, form.reason);
        if (!result.ok) {
          flashError(req, result.error);
          return res.redirect("/login");
        }
      } else if (!(await storage.getJournalByToken(token))) {
        flash(req, "Solicitação não encontrada", "danger");
        return res.redirect("/login");
      }

      flash(req, "Avaliação registrada", "success");
      res.redirect(`/approve/${encodeURIComponent(token)}`);
    } catch (error) {
      serverError(req, res, "deciding journal", error);
    }
  });

  // ==================== ASSETS ====================

  app.post(
    "/assets",
    requirePermission("manage_assets"),
    acceptUpload("file", "/dashboard?tab=assets"),
    async (req, res) => {
      try {
        const back = "/dashboard?tab=assets";
        const form = readForm(assetSchema, req, res, back);
        if (!form) return;

        if (!req.file || !req.file.originalname) {
          flash(req, "Selecione um arquivo para enviar", "warning");
          return res.redirect(back);
        }
        if (!isAllowedFile(req.file.originalname, ALLOWED_ASSET_EXTENSIONS)) {
          flash(req, "Formato de arquivo não permitido", "danger");
          return res.redirect(back);
        }

        const storedName = await portal.assetFiles.store(req.file.buffer, req.file.originalname);
        await storage.createAsset({
          originalName: req.file.originalname,
          storedName,
          notes: form.notes,
          owner: form.owner || principalOf(req).username,
          departmentId: form.department_id || null,
        });
        flash(req, "Arquivo arquivado com sucesso", "success");
        res.redirect(safeRedirect(form.redirect_to, back));
      } catch (error) {
        serverError(req, res, "uploading asset", error);
      }
    },
  );

  // ==================== DOWNLOADS ====================

  app.get("/uploads/journals/:filename", requireAuth, async (req, res) => {
    try {
      const filePath = await portal.journalFiles.locate(req.params.filename);
      if (!filePath) return sendErrorPage(req, res, 404, "Arquivo não encontrado");
      res.sendFile(filePath);
    } catch (error) {
      serverError(req, res, "downloading journal", error);
    }
  });

  app.get("/uploads/assets/:filename", requireAuth, async (req, res) => {
    try {
      const filePath = await portal.assetFiles.locate(req.params.filename);
      if (!filePath) return sendErrorPage(req, res, 404, "Arquivo não encontrado");
      res.sendFile(filePath);
    } catch (error) {
      serverError(req, res, "downloading asset", error);
    }
  });

  // ==================== RULES / ANNOUNCEMENTS / CALENDAR ====================

  app.post("/rules", requirePermission("manage_rules"), async (req, res) => {
    try {
      const form = readForm(rulesSchema, req, res, "/dashboard?tab=rules");
      if (!form) return;
      await storage.updateRules(form.content);
      flash(req, "Manual de regras atualizado", "success");
      res.redirect("/dashboard?tab=rules");
    } catch (error) {
      serverError(req, res, "updating rules", error);
    }
  });

  app.post("/announcements", requirePermission("manage_announcements"), async (req, res) => {
    try {
      const back = "/dashboard?tab=announcements";
      const form = readForm(announcementSchema, req, res, back);
      if (!form) return;
      await storage.createAnnouncement({
        title: form.title,
        body: form.body,
        audience: form.audience,
        pinned: form.pinned,
      });
      flash(req, "Mensagem publicada", "success");
      res.redirect(safeRedirect(form.redirect_to, back));
    } catch (error) {
      serverError(req, res, "creating announcement", error);
    }
  });

  app.post("/announcements/:id/remove", requirePermission("manage_announcements"), async (req, res) => {
    try {
      await storage.removeAnnouncement(req.params.id);
      flash(req, "Mensagem removida", "info");
      res.redirect("/dashboard?tab=announcements");
    } catch (error) {
      serverError(req, res, "removing announcement", error);
    }
  });

  app.post("/calendar", requirePermission("manage_calendar"), async (req, res) => {
    try {
      const back = "/dashboard?tab=calendar";
      const form = readForm(calendarSchema, req, res, back);
      if (!form) return;
      await storage.createEvent({
        title: form.title,
        date: form.date,
        category: form.category,
        departmentId: form.department_id || null,
        description: form.description,
      });
      flash(req, "Evento adicionado", "success");
      res.redirect(safeRedirect(form.redirect_to, back));
    } catch (error) {
      serverError(req, res, "adding calendar event", error);
    }
  });

  // ==================== TICKETS ====================

  const ticketsTab = "/dashboard?tab=tickets";

  app.post("/tickets", requireAuth, async (req, res) => {
    try {
      const form = readForm(ticketSchema, req, res, ticketsTab);
      if (!form) return;
      await tickets.open(principalOf(req), {
        title: form.title,
        reason: form.reason,
        customReason: form.custom_reason,
        urgency: form.urgency,
        message: form.message,
      });
      flash(req, "Ticket criado e enviado para a diretoria", "success");
      res.redirect(ticketsTab);
    } catch (error) {
      serverError(req, res, "creating ticket", error);
    }
  });

  app.post("/tickets/:id/reply", requireAuth, async (req, res) => {
    try {
      const form = messageSchema.parse(req.body ?? {});
      if (!form.message) {
        flash(req, "Escreva uma mensagem", "warning");
        return res.redirect(ticketsTab);
      }
      const result = await tickets.reply(req.params.id, principalOf(req), form.message);
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Resposta enviada", "success");
      }
      res.redirect(ticketsTab);
    } catch (error) {
      serverError(req, res, "replying to ticket", error);
    }
  });

  app.post("/tickets/:id/close", requirePermission("manage_tickets"), async (req, res) => {
    try {
      const form = messageSchema.parse(req.body ?? {});
      const result = await tickets.close(req.params.id, principalOf(req), form.message);
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Ticket encerrado", "info");
      }
      res.redirect(ticketsTab);
    } catch (error) {
      serverError(req, res, "closing ticket", error);
    }
  });

  app.post("/tickets/:id/delete", requirePermission("manage_tickets"), async (req, res) => {
    try {
      const result = await tickets.delete(req.params.id, principalOf(req));
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Ticket removido", "info");
      }
      res.redirect(ticketsTab);
    } catch (error) {
      serverError(req, res, "deleting ticket", error);
    }
  });

  // ==================== DEPARTMENTS ====================

  const departmentsTab = "/dashboard?tab=departments";

  app.post("/departments", requirePermission("manage_departments"), async (req, res) => {
    try {
      const form = readForm(departmentSchema, req, res, safeRedirect(req.body?.redirect_to, departmentsTab));
      if (!form) return;
      await departments.create({
        name: form.name,
        description: form.description,
        director: form.director,
      });
      flash(req, "Departamento criado", "success");
      res.redirect(safeRedirect(form.redirect_to, departmentsTab));
    } catch (error) {
      serverError(req, res, "creating department", error);
    }
  });

  app.post(
    "/departments/:id/queue/:queueId/:action",
    requirePermission("approve_departments"),
    async (req, res) => {
      try {
        const action = queueActionSchema.safeParse(req.params.action);
        if (!action.success) {
          flash(req, "Ação inválida", "danger");
          return res.redirect(departmentsTab);
        }

        const result = await departments.decide(req.params.id, req.params.queueId, action.data, principalOf(req));
        if (!result.ok) {
          // Stale decide forms land here
          flash(req, result.error.message, result.error.kind === "not_found" ? "warning" : "danger");
        } else {
          flash(req, "Fila atualizada", "info");
        }
        res.redirect(departmentsTab);
      } catch (error) {
        serverError(req, res, "deciding queue entry", error);
      }
    },
  );

  app.post("/departments/:id/members", requirePermission("manage_departments"), async (req, res) => {
    try {
      const form = readForm(memberSchema, req, res, departmentsTab);
      if (!form) return;
      const result = await departments.addMember(req.params.id, form.name, form.role);
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Membro adicionado", "success");
      }
      res.redirect(departmentsTab);
    } catch (error) {
      serverError(req, res, "adding member", error);
    }
  });

  // Public join link: the token is the only credential
  app.get("/departments/apply/:token", async (req, res) => {
    try {
      const department = await departments.findByToken(req.params.token);
      if (!department) {
        flash(req, "Link de inscrição inválido", "danger");
        return res.redirect("/login");
      }
      res.send(renderApplyDepartment(await pageContext(req), department));
    } catch (error) {
      serverError(req, res, "rendering department application", error);
    }
  });

  app.post("/departments/apply/:token", async (req, res) => {
    try {
      const applyPath = `/departments/apply/${encodeURIComponent(req.params.token)}`;
      const form = readForm(applySchema, req, res, applyPath);
      if (!form) return;

      const result = await departments.submitRequest(req.params.token, {
        name: form.name,
        contact: form.contact,
        desiredRole: form.desired_role,
        motivation: form.motivation,
      });
      if (!result.ok) {
        flashError(req, result.error);
        return res.redirect("/login");
      }
      flash(req, "Solicitação registrada! Aguarde o retorno do diretor.", "success");
      res.redirect(applyPath);
    } catch (error) {
      serverError(req, res, "submitting department application", error);
    }
  });

  // ==================== ROLES & USERS ====================

  const settingsTab = "/dashboard?tab=settings";

  app.post("/roles", requirePermission("manage_roles"), async (req, res) => {
    try {
      const form = readForm(roleSchema, req, res, settingsTab);
      if (!form) return;
      const result = await roles.createRole(form.name, form.description, form.permissions);
      if (!result.ok) {
        flashError(req, result.error);
        return res.redirect(settingsTab);
      }
      flash(req, "Cargo criado", "success");
      res.redirect(safeRedirect(form.redirect_to, settingsTab));
    } catch (error) {
      serverError(req, res, "creating role", error);
    }
  });

  app.post("/roles/:name", requirePermission("manage_roles"), async (req, res) => {
    try {
      const form = roleSchema.omit({ name: true }).parse(req.body ?? {});
      const result = await roles.updateRole(req.params.name, form.description, form.permissions);
      if (!result.ok) {
        flashError(req, result.error);
      } else {
        flash(req, "Cargo atualizado. As permissões valem a partir do próximo login.", "success");
      }
      res.redirect(safeRedirect(form.redirect_to, settingsTab));
    } catch (error) {
      serverError(req, res, "updating role", error);
    }
  });

  app.post("/users", requirePermission("manage_users"), async (req, res) => {
    try {
      const form = readForm(userSchema, req, res, settingsTab);
      if (!form) return;
      const result = await identity.createUser({
        name: form.name,
        username: form.username,
        password: form.password,
        role: form.role,
        portalEnabled: form.portal_enabled,
      });
      if (!result.ok) {
        flashError(req, result.error);
        return res.redirect(settingsTab);
      }
      flash(req, "Usuário criado com sucesso", "success");
      res.redirect(safeRedirect(form.redirect_to, settingsTab));
    } catch (error) {
      serverError(req, res, "creating user", error);
    }
  });

  app.post("/users/:id/role", requirePermission("manage_roles"), async (req, res) => {
    try {
      const form = userRoleSchema.parse(req.body ?? {});
      const result = await identity.changeUserRole(req.params.id, form.role);
      if (!result.ok) {
        flashError(req, result.error);
        return res.redirect(settingsTab);
      }
      flash(req, "Permissões atualizadas", "success");
      res.redirect(safeRedirect(form.redirect_to, settingsTab));
    } catch (error) {
      serverError(req, res, "changing user role", error);
    }
  });

  app.post("/users/:id/toggle", requirePermission("manage_users"), async (req, res) => {
    try {
      const result = await identity.toggleUser(req.params.id);
      if (!result.ok) {
        flashError(req, result.error);
        return res.redirect(settingsTab);
      }
      flash(req, "Acesso atualizado", "info");
      res.redirect(safeRedirect(req.body?.redirect_to, settingsTab));
    } catch (error) {
      serverError(req, res, "toggling user", error);
    }
  });

  // ==================== SETTINGS ====================

  app.post("/settings", requirePermission("manage_settings"), async (req, res) => {
    try {
      const form = visualSettingsSchema.parse(req.body ?? {});
      await storage.updateVisualSettings({
        logoUrl: form.logo_url,
        primaryColor: form.primary_color,
        accentColor: form.accent_color,
        tagline: form.tagline,
      });
      flash(req, "Configurações visuais atualizadas", "success");
      res.redirect(settingsTab);
    } catch (error) {
      serverError(req, res, "updating settings", error);
    }
  });

  app.post("/settings/widgets", requirePermission("manage_settings"), async (req, res) => {
    try {
      const form = widgetFormSchema.parse(req.body ?? {});
      await storage.updateWidgets((widgets) => applyWidgetForm(widgets, form));
      flash(req, "Widgets atualizados com sucesso", "success");
      res.redirect(settingsTab);
    } catch (error) {
      serverError(req, res, "updating widgets", error);
    }
  });

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use((req, res) => {
    sendErrorPage(req, res, 404, "Página não encontrada");
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    serverError(req, res, `handling ${req.method} ${req.path}`, err);
  });

  return httpServer;
}
