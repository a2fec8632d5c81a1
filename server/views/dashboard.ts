import {
  PERMISSIONS,
  TICKET_REASONS,
  type Announcement,
  type Asset,
  type CalendarEvent,
  type Department,
  type Journal,
  type Permission,
  type Role,
  type Rules,
  type Student,
  type Ticket,
  type UserSummary,
  type Widget,
  type WidgetCard,
} from "../../shared/schema";
import { escapeHtml, formatDate, layout, redirectField, type PageContext } from "./html";

export const DASHBOARD_TABS = [
  ["students", "Funcionários"],
  ["journals", "Jornais"],
  ["assets", "Arquivos"],
  ["rules", "Manual de Regras"],
  ["announcements", "Administração"],
  ["calendar", "Calendário"],
  ["departments", "Departamentos"],
  ["tickets", "Ajuda"],
  ["settings", "Configuração"],
] as const;

export type DashboardTab = (typeof DASHBOARD_TABS)[number][0];

export function parseTab(value: unknown): DashboardTab {
  const match = DASHBOARD_TABS.find(([id]) => id === value);
  return match ? match[0] : "students";
}

export interface DashboardData {
  tab: DashboardTab;
  baseUrl: string;
  students: Student[];
  journals: Journal[];
  assets: Asset[];
  rules: Rules;
  announcements: Announcement[];
  events: CalendarEvent[];
  departments: Department[];
  users: UserSummary[];
  roles: Role[];
  allPermissions: string[];
  tickets: Ticket[];
  widgetCards: WidgetCard[];
  widgetConfig: Widget[];
}

type Can = (token: Permission) => boolean;

function postButton(action: string, label: string, style = "outline-secondary", extra = ""): string {
  return `<form method="post" action="${escapeHtml(action)}" class="d-inline">${extra}
    <button class="btn btn-sm btn-${style}" type="submit">${escapeHtml(label)}</button></form>`;
}

function departmentOptions(departments: Department[], emptyLabel: string): string {
  return [
    `<option value="">${escapeHtml(emptyLabel)}</option>`,
    ...departments.map((d) => `<option value="${escapeHtml(d.id)}">${escapeHtml(d.name)}</option>`),
  ].join("");
}

function roleOptions(roles: Role[], selected?: string): string {
  return roles
    .map(
      (r) =>
        `<option value="${escapeHtml(r.name)}"${r.name === selected ? " selected" : ""}>${escapeHtml(r.name)}</option>`,
    )
    .join("");
}

function permissionChecks(known: string[], checked: string[], prefix: string): string {
  const tokens = [...new Set([...PERMISSIONS, ...known])];
  return tokens
    .map(
      (token) => `<div class="form-check form-check-inline">
        <input class="form-check-input" type="checkbox" name="permissions" value="${escapeHtml(token)}" id="${prefix}-${escapeHtml(token)}"${checked.includes(token) ? " checked" : ""}>
        <label class="form-check-label" for="${prefix}-${escapeHtml(token)}">${escapeHtml(token)}</label>
      </div>`,
    )
    .join("");
}

function renderWidgetCards(cards: WidgetCard[]): string {
  if (cards.length === 0) return "";
  return `<div class="row g-3 mb-4">${cards
    .map(
      (card) => `<div class="col-md">
        <div class="card h-100 shadow-sm"><div class="card-body">
          <h2 class="h6 text-muted mb-1">${escapeHtml(card.title)}</h2>
          <small class="text-muted">${escapeHtml(card.subtitle)}</small>
          ${card.value !== undefined ? `<p class="fs-4 fw-semibold my-2">${escapeHtml(card.value)}</p>` : ""}
          ${card.content ? `<p class="my-2">${escapeHtml(card.content)}</p>` : ""}
          ${card.helper ? `<small>${escapeHtml(card.helper)}</small>` : ""}
        </div></div>
      </div>`,
    )
    .join("")}</div>`;
}

function studentsTab(data: DashboardData, can: Can): string {
  const rows = data.students
    .map(
      (s) => `<tr>
        <td>${escapeHtml(s.name)}</td><td>${escapeHtml(s.role)}</td><td>${escapeHtml(s.contact)}</td>
        <td>${s.portal_enabled ? "Liberado" : "Bloqueado"}</td>
        <td>${can("manage_students") ? postButton(`/students/${s.id}/toggle`, "Alternar acesso") : ""}</td>
      </tr>`,
    )
    .join("");
  const form = can("manage_students")
    ? `<form method="post" action="/students" class="card card-body mb-3">
        <div class="row g-2">
          <div class="col-md-3"><input class="form-control" name="name" placeholder="Nome" required></div>
          <div class="col-md-3"><input class="form-control" name="role" placeholder="Função"></div>
          <div class="col-md-3"><input class="form-control" name="contact" placeholder="Contato"></div>
          <div class="col-md-3"><input class="form-control" name="notes" placeholder="Observações"></div>
        </div>
        <div class="form-check my-2"><input class="form-check-input" type="checkbox" name="portal_enabled" id="portal_enabled"><label class="form-check-label" for="portal_enabled">Acesso ao portal</label></div>
        <button class="btn btn-primary btn-sm align-self-start" type="submit">Criar ficha</button>
      </form>`
    : "";
  return `${form}<table class="table table-sm bg-white"><thead><tr><th>Nome</th><th>Função</th><th>Contato</th><th>Portal</th><th></th></tr></thead><tbody>${rows}</tbody></table>`;
}

function journalsTab(data: DashboardData, can: Can): string {
  const rows = data.journals
    .map((j) => {
      const file = j.file ? `<a href="/uploads/journals/${encodeURIComponent(j.file)}">PDF</a>` : "";
      const link = can("manage_journals")
        ? `<code>${escapeHtml(`${data.baseUrl}/approve/${j.approval_token}`)}</code>`
        : "";
      return `<tr>
        <td>${escapeHtml(j.title)}</td><td>${escapeHtml(j.edition)}</td><td>${escapeHtml(j.release_date)}</td>
        <td>${escapeHtml(j.status)}${j.approval_reason ? ` · ${escapeHtml(j.approval_reason)}` : ""}</td>
        <td>${file}</td><td>${link}</td>
      </tr>`;
    })
    .join("");
  const form = can("manage_journals")
    ? `<form method="post" action="/journals" enctype="multipart/form-data" class="card card-body mb-3">
        <div class="row g-2">
          <div class="col-md-4"><input class="form-control" name="title" placeholder="Título" required></div>
          <div class="col-md-2"><input class="form-control" name="edition" placeholder="Edição"></div>
          <div class="col-md-2"><input class="form-control" type="date" name="release_date"></div>
          <div class="col-md-4"><input class="form-control" type="file" name="file" accept=".pdf"></div>
          <div class="col-12"><textarea class="form-control" name="description" placeholder="Descrição"></textarea></div>
        </div>
        <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Enviar para aprovação</button>
      </form>`
    : "";
  return `${form}<table class="table table-sm bg-white"><thead><tr><th>Título</th><th>Edição</th><th>Lançamento</th><th>Situação</th><th>Arquivo</th><th>Link de aprovação</th></tr></thead><tbody>${rows}</tbody></table>`;
}

function assetsTab(data: DashboardData, can: Can): string {
  const departmentNames = new Map(data.departments.map((d) => [d.id, d.name]));
  const rows = data.assets
    .map(
      (a) => `<tr>
        <td><a href="/uploads/assets/${encodeURIComponent(a.stored_name)}">${escapeHtml(a.original_name)}</a></td>
        <td>${escapeHtml(a.owner)}</td>
        <td>${a.department_id ? escapeHtml(departmentNames.get(a.department_id) ?? a.department_id) : "Pessoal"}</td>
        <td>${escapeHtml(a.notes)}</td><td>${formatDate(a.uploaded_at)}</td>
      </tr>`,
    )
    .join("");
  const form = can("manage_assets")
    ? `<form method="post" action="/assets" enctype="multipart/form-data" class="card card-body mb-3">
        <div class="row g-2">
          <div class="col-md-4"><input class="form-control" type="file" name="file" required></div>
          <div class="col-md-3"><input class="form-control" name="owner" placeholder="Responsável"></div>
          <div class="col-md-3"><select class="form-select" name="department_id">${departmentOptions(data.departments, "Arquivo pessoal")}</select></div>
          <div class="col-md-2"><input class="form-control" name="notes" placeholder="Notas"></div>
        </div>
        <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Arquivar</button>
      </form>`
    : "";
  return `${form}<table class="table table-sm bg-white"><thead><tr><th>Arquivo</th><th>Responsável</th><th>Escopo</th><th>Notas</th><th>Enviado em</th></tr></thead><tbody>${rows}</tbody></table>`;
}

function rulesTab(data: DashboardData, can: Can): string {
  const updated = data.rules.updated_at
    ? `<small class="text-muted">Atualizado em ${formatDate(data.rules.updated_at)}</small>`
    : "";
  if (!can("manage_rules")) {
    return `<div class="card card-body"><div style="white-space: pre-wrap">${escapeHtml(data.rules.content)}</div>${updated}</div>`;
  }
  return `<form method="post" action="/rules" class="card card-body">
    <textarea class="form-control mb-2" name="content" rows="12">${escapeHtml(data.rules.content)}</textarea>
    ${updated}
    <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Salvar manual</button>
  </form>`;
}

function announcementsTab(data: DashboardData, can: Can): string {
  const items = data.announcements
    .map(
      (a) => `<div class="card card-body mb-2${a.pinned ? " border-primary" : ""}">
        <h3 class="h6">${a.pinned ? "📌 " : ""}${escapeHtml(a.title)}</h3>
        <p class="mb-1">${escapeHtml(a.body)}</p>
        <small class="text-muted">Para: ${escapeHtml(a.audience)} · ${formatDate(a.created_at)}</small>
        ${can("manage_announcements") ? `<div class="mt-2">${postButton(`/announcements/${a.id}/remove`, "Remover", "outline-danger")}</div>` : ""}
      </div>`,
    )
    .join("");
  const form = can("manage_announcements")
    ? `<form method="post" action="/announcements" class="card card-body mb-3">
        <input class="form-control mb-2" name="title" placeholder="Título" required>
        <textarea class="form-control mb-2" name="body" placeholder="Mensagem"></textarea>
        <div class="row g-2">
          <div class="col-md-4"><input class="form-control" name="audience" placeholder="Público (todos)"></div>
          <div class="col-md-4 form-check ms-2"><input class="form-check-input" type="checkbox" name="pinned" id="pinned"><label class="form-check-label" for="pinned">Fixar</label></div>
        </div>
        <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Publicar</button>
      </form>`
    : "";
  return form + items;
}

function calendarTab(data: DashboardData, can: Can): string {
  const rows = data.events
    .map(
      (e) => `<tr><td>${escapeHtml(e.date)}</td><td>${escapeHtml(e.title)}</td><td>${escapeHtml(e.category)}</td><td>${escapeHtml(e.description)}</td></tr>`,
    )
    .join("");
  const form = can("manage_calendar")
    ? `<form method="post" action="/calendar" class="card card-body mb-3">
        <div class="row g-2">
          <div class="col-md-3"><input class="form-control" name="title" placeholder="Evento" required></div>
          <div class="col-md-2"><input class="form-control" type="date" name="date"></div>
          <div class="col-md-2"><input class="form-control" name="category" placeholder="Categoria (geral)"></div>
          <div class="col-md-2"><select class="form-select" name="department_id">${departmentOptions(data.departments, "Todos")}</select></div>
          <div class="col-md-3"><input class="form-control" name="description" placeholder="Descrição"></div>
        </div>
        <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Adicionar evento</button>
      </form>`
    : "";
  return `${form}<table class="table table-sm bg-white"><thead><tr><th>Data</th><th>Evento</th><th>Categoria</th><th>Descrição</th></tr></thead><tbody>${rows}</tbody></table>`;
}

function departmentCard(department: Department, data: DashboardData, can: Can): string {
  const pending = department.queue.filter((q) => q.status === "pendente");
  const queue = pending
    .map(
      (q) => `<li class="list-group-item">
        <strong>${escapeHtml(q.name)}</strong> · ${escapeHtml(q.desired_role)} · ${escapeHtml(q.contact)}
        <div class="small text-muted">${escapeHtml(q.motivation)}</div>
        ${
          can("approve_departments")
            ? `<div class="mt-1">${postButton(`/departments/${department.id}/queue/${q.id}/approve`, "Aprovar", "success")}
               ${postButton(`/departments/${department.id}/queue/${q.id}/reject`, "Rejeitar", "outline-danger")}</div>`
            : ""
        }
      </li>`,
    )
    .join("");
  const members = department.members
    .map((m) => `<li>${escapeHtml(m.name)} · ${escapeHtml(m.role)}</li>`)
    .join("");
  const addMember = can("manage_departments")
    ? `<form method="post" action="/departments/${escapeHtml(department.id)}/members" class="row g-2 mt-2">
        <div class="col"><input class="form-control form-control-sm" name="name" placeholder="Nome" required></div>
        <div class="col"><input class="form-control form-control-sm" name="role" placeholder="Função"></div>
        <div class="col-auto"><button class="btn btn-sm btn-outline-primary" type="submit">Adicionar membro</button></div>
      </form>`
    : "";
  const joinLink = `${data.baseUrl}/departments/apply/${department.join_token}`;

  return `<div class="card mb-3"><div class="card-body">
    <h3 class="h5">${escapeHtml(department.name)}</h3>
    <p class="text-muted mb-1">${escapeHtml(department.description)}</p>
    <p class="small">Diretor: ${escapeHtml(department.director)} · Link de inscrição: <code>${escapeHtml(joinLink)}</code></p>
    <h4 class="h6">Fila (${pending.length})</h4>
    <ul class="list-group mb-2">${queue || '<li class="list-group-item text-muted">Nenhuma solicitação pendente</li>'}</ul>
    <h4 class="h6">Membros (${department.members.length})</h4>
    <ul>${members}</ul>
    ${addMember}
  </div></div>`;
}

function departmentsTab(data: DashboardData, can: Can): string {
  const form = can("manage_departments")
    ? `<form method="post" action="/departments" class="card card-body mb-3">
        <div class="row g-2">
          <div class="col-md-3"><input class="form-control" name="name" placeholder="Nome" required></div>
          <div class="col-md-3"><input class="form-control" name="director" placeholder="Diretor"></div>
          <div class="col-md-6"><input class="form-control" name="description" placeholder="Descrição"></div>
        </div>
        <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Criar departamento</button>
      </form>`
    : "";
  return form + data.departments.map((d) => departmentCard(d, data, can)).join("");
}

function ticketCard(ticket: Ticket, can: Can): string {
  const messages = ticket.messages
    .map(
      (m) => `<li class="list-group-item"><strong>${escapeHtml(m.author)}</strong> <small class="text-muted">${escapeHtml(m.role)} · ${formatDate(m.timestamp)}</small>
        <div>${escapeHtml(m.body)}</div></li>`,
    )
    .join("");
  const manage = can("manage_tickets")
    ? `${postButton(`/tickets/${ticket.id}/close`, "Encerrar", "outline-secondary", '<input type="hidden" name="message" value="">')}
       ${postButton(`/tickets/${ticket.id}/delete`, "Excluir", "outline-danger")}`
    : "";
  return `<div class="card mb-3"><div class="card-body">
    <h3 class="h6">${escapeHtml(ticket.title)} <span class="badge bg-${ticket.status === "aberto" ? "warning" : "secondary"}">${escapeHtml(ticket.status)}</span></h3>
    <p class="small text-muted">${escapeHtml(ticket.reason)} · urgência ${escapeHtml(ticket.urgency)} · por ${escapeHtml(ticket.created_by)}</p>
    <ul class="list-group mb-2">${messages}</ul>
    <form method="post" action="/tickets/${escapeHtml(ticket.id)}/reply" class="d-flex gap-2 mb-2">
      <input class="form-control form-control-sm" name="message" placeholder="Responder" required>
      <button class="btn btn-sm btn-primary" type="submit">Enviar</button>
    </form>
    ${manage}
  </div></div>`;
}

function ticketsTab(data: DashboardData, can: Can): string {
  const reasons = TICKET_REASONS.map((r) => `<option>${escapeHtml(r)}</option>`).join("");
  return `<form method="post" action="/tickets" class="card card-body mb-3">
      <div class="row g-2">
        <div class="col-md-4"><input class="form-control" name="title" placeholder="Assunto" required></div>
        <div class="col-md-3"><select class="form-select" name="reason">${reasons}</select></div>
        <div class="col-md-3"><input class="form-control" name="custom_reason" placeholder="Outro motivo"></div>
        <div class="col-md-2"><select class="form-select" name="urgency"><option>baixa</option><option selected>normal</option><option>alta</option></select></div>
        <div class="col-12"><textarea class="form-control" name="message" placeholder="Descreva o pedido" required></textarea></div>
      </div>
      <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Abrir ticket</button>
    </form>
    ${data.tickets.map((t) => ticketCard(t, can)).join("")}`;
}

function settingsTab(data: DashboardData, ctx: PageContext, can: Can): string {
  const parts: string[] = [];

  if (can("manage_settings")) {
    const s = ctx.settings;
    parts.push(`<form method="post" action="/settings" class="card card-body mb-3">
      <h3 class="h6">Identidade visual</h3>
      <div class="row g-2">
        <div class="col-md-4"><input class="form-control" name="logo_url" value="${escapeHtml(s.logo_url)}" placeholder="URL do logo"></div>
        <div class="col-md-2"><input class="form-control form-control-color" type="color" name="primary_color" value="${escapeHtml(s.primary_color)}"></div>
        <div class="col-md-2"><input class="form-control form-control-color" type="color" name="accent_color" value="${escapeHtml(s.accent_color)}"></div>
        <div class="col-md-4"><input class="form-control" name="tagline" value="${escapeHtml(s.tagline)}"></div>
      </div>
      <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Salvar</button>
    </form>`);

    const widgetRows = data.widgetConfig
      .map(
        (w) => `<div class="row g-2 mb-1 align-items-center">
          <div class="col-md-2 form-check ms-2"><input class="form-check-input" type="checkbox" name="enabled_${escapeHtml(w.id)}" id="w-${escapeHtml(w.id)}"${w.enabled ? " checked" : ""}><label class="form-check-label" for="w-${escapeHtml(w.id)}">${escapeHtml(w.id)}</label></div>
          <div class="col-md-4"><input class="form-control form-control-sm" name="title_${escapeHtml(w.id)}" value="${escapeHtml(w.title)}"></div>
          <div class="col-md-5"><input class="form-control form-control-sm" name="subtitle_${escapeHtml(w.id)}" value="${escapeHtml(w.subtitle)}"></div>
        </div>`,
      )
      .join("");
    parts.push(`<form method="post" action="/settings/widgets" class="card card-body mb-3">
      <h3 class="h6">Widgets do painel</h3>${widgetRows}
      <button class="btn btn-primary btn-sm mt-2 align-self-start" type="submit">Atualizar widgets</button>
    </form>`);
  }

  if (can("manage_roles")) {
    const roles = data.roles
      .map(
        (r) => `<form method="post" action="/roles/${encodeURIComponent(r.name)}" class="border rounded p-2 mb-2">
          <strong>${escapeHtml(r.name)}</strong>
          <input class="form-control form-control-sm my-1" name="description" value="${escapeHtml(r.description)}">
          ${permissionChecks(data.allPermissions, r.permissions, `role-${r.name.replace(/\W/g, "")}`)}
          <button class="btn btn-sm btn-outline-primary" type="submit">Salvar cargo</button>
        </form>`,
      )
      .join("");
    parts.push(`<div class="card card-body mb-3"><h3 class="h6">Cargos</h3>${roles}
      <form method="post" action="/roles" class="border rounded p-2">
        <input class="form-control form-control-sm mb-1" name="name" placeholder="Novo cargo" required>
        <input class="form-control form-control-sm mb-1" name="description" placeholder="Descrição">
        ${permissionChecks(data.allPermissions, [], "new-role")}
        <button class="btn btn-sm btn-primary" type="submit">Criar cargo</button>
      </form></div>`);
  }

  if (can("manage_users") || can("manage_roles")) {
    const rows = data.users
      .map(
        (u) => `<tr><td>${escapeHtml(u.name)}</td><td>${escapeHtml(u.username)}</td>
          <td>${
            can("manage_roles")
              ? `<form method="post" action="/users/${escapeHtml(u.id)}/role" class="d-flex gap-1"><select class="form-select form-select-sm" name="role">${roleOptions(data.roles, u.role)}</select><button class="btn btn-sm btn-outline-primary" type="submit">Alterar</button></form>`
              : escapeHtml(u.role)
          }</td>
          <td>${u.portal_enabled ? "Ativo" : "Bloqueado"}</td>
          <td>${can("manage_users") ? postButton(`/users/${u.id}/toggle`, "Alternar acesso") : ""}</td></tr>`,
      )
      .join("");
    const form = can("manage_users")
      ? `<form method="post" action="/users" class="row g-2 mt-2">
          <div class="col-md-3"><input class="form-control form-control-sm" name="name" placeholder="Nome"></div>
          <div class="col-md-2"><input class="form-control form-control-sm" name="username" placeholder="Usuário" required></div>
          <div class="col-md-2"><input class="form-control form-control-sm" type="password" name="password" placeholder="Senha" required></div>
          <div class="col-md-2"><select class="form-select form-select-sm" name="role">${roleOptions(data.roles)}</select></div>
          <div class="col-md-1 form-check"><input class="form-check-input" type="checkbox" name="portal_enabled" checked></div>
          <div class="col-md-2"><button class="btn btn-sm btn-primary" type="submit">Criar usuário</button></div>
        </form>`
      : "";
    parts.push(`<div class="card card-body"><h3 class="h6">Usuários</h3>
      <table class="table table-sm"><thead><tr><th>Nome</th><th>Usuário</th><th>Cargo</th><th>Acesso</th><th></th></tr></thead><tbody>${rows}</tbody></table>${form}</div>`);
  }

  return parts.join("") || '<p class="text-muted">Sem opções de configuração para o seu cargo.</p>';
}

export function renderDashboard(ctx: PageContext, data: DashboardData): string {
  const permissions = ctx.principal?.permissions ?? [];
  const can: Can = (token) => permissions.includes(token);

  const nav = DASHBOARD_TABS.map(
    ([id, label]) =>
      `<li class="nav-item"><a class="nav-link${id === data.tab ? " active" : ""}" href="/dashboard?tab=${id}">${escapeHtml(label)}</a></li>`,
  ).join("");

  const sections: Record<DashboardTab, () => string> = {
    students: () => studentsTab(data, can),
    journals: () => journalsTab(data, can),
    assets: () => assetsTab(data, can),
    rules: () => rulesTab(data, can),
    announcements: () => announcementsTab(data, can),
    calendar: () => calendarTab(data, can),
    departments: () => departmentsTab(data, can),
    tickets: () => ticketsTab(data, can),
    settings: () => settingsTab(data, ctx, can),
  };

  return layout(
    "Painel",
    ctx,
    `${renderWidgetCards(data.widgetCards)}
    <ul class="nav nav-pills mb-3 flex-wrap">${nav}</ul>
    <section id="tab-${data.tab}">${sections[data.tab]()}</section>`,
  );
}

export function renderWelcome(
  ctx: PageContext,
  data: { departments: Department[]; users: UserSummary[]; roles: Role[] },
): string {
  const ready = data.departments.length > 0 && data.users.length > 0;
  return layout(
    "Configuração inicial",
    ctx,
    `<h1 class="h3">Configuração inicial</h1>
    <p>Crie ao menos um departamento e um usuário para liberar o painel.</p>
    <div class="row g-3">
      <div class="col-md-6"><div class="card card-body">
        <h2 class="h6">Departamentos (${data.departments.length})</h2>
        <ul>${data.departments.map((d) => `<li>${escapeHtml(d.name)}</li>`).join("")}</ul>
        <form method="post" action="/departments">
          ${redirectField("/welcome")}
          <input class="form-control form-control-sm mb-1" name="name" placeholder="Nome" required>
          <input class="form-control form-control-sm mb-1" name="director" placeholder="Diretor">
          <input class="form-control form-control-sm mb-1" name="description" placeholder="Descrição">
          <button class="btn btn-sm btn-primary" type="submit">Criar departamento</button>
        </form>
      </div></div>
      <div class="col-md-6"><div class="card card-body">
        <h2 class="h6">Usuários (${data.users.length})</h2>
        <ul>${data.users.map((u) => `<li>${escapeHtml(u.name)} (${escapeHtml(u.username)}) · ${escapeHtml(u.role)}</li>`).join("")}</ul>
        <form method="post" action="/users">
          ${redirectField("/welcome")}
          <input class="form-control form-control-sm mb-1" name="name" placeholder="Nome">
          <input class="form-control form-control-sm mb-1" name="username" placeholder="Usuário" required>
          <input class="form-control form-control-sm mb-1" type="password" name="password" placeholder="Senha" required>
          <select class="form-select form-select-sm mb-1" name="role">${roleOptions(data.roles)}</select>
          <input type="hidden" name="portal_enabled" value="on">
          <button class="btn btn-sm btn-primary" type="submit">Criar usuário</button>
        </form>
      </div></div>
    </div>
    <form method="post" action="/welcome/complete" class="mt-3">
      <button class="btn btn-success" type="submit"${ready ? "" : " disabled"}>Concluir configuração</button>
    </form>`,
  );
}
