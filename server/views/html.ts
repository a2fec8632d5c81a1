import type { Principal, SiteSettings } from "../../shared/schema";
import type { FlashMessage } from "../auth";

export interface PageContext {
  settings: SiteSettings;
  principal?: Principal;
  flashes: FlashMessage[];
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

export function formatDate(iso: string | null | undefined): string {
  if (!iso) return "";
  return escapeHtml(iso.slice(0, 16).replace("T", " "));
}

export function redirectField(to: string): string {
  return `<input type="hidden" name="redirect_to" value="${escapeHtml(to)}">`;
}

function renderFlashes(flashes: FlashMessage[]): string {
  return flashes
    .map(
      (f) => `<div class="alert alert-${f.category} alert-dismissible" role="alert">
        ${escapeHtml(f.message)}
        <button type="button" class="btn-close" data-bs-dismiss="alert" aria-label="Fechar"></button>
      </div>`,
    )
    .join("\n");
}

export function layout(title: string, ctx: PageContext, body: string): string {
  const { settings, principal } = ctx;
  const logo = settings.logo_url
    ? `<img src="${escapeHtml(settings.logo_url)}" alt="" height="32" class="me-2">`
    : "";
  const userNav = principal
    ? `<span class="navbar-text me-3">${escapeHtml(principal.username)} · ${escapeHtml(principal.role)}</span>
       <a class="btn btn-outline-light btn-sm" href="/logout">Sair</a>`
    : "";

  return `<!doctype html>
<html lang="pt-BR">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css">
  <style>
    :root { --portal-primary: ${escapeHtml(settings.primary_color)}; --portal-accent: ${escapeHtml(settings.accent_color)}; }
    .navbar-portal { background: var(--portal-primary); }
    .nav-pills .nav-link.active { background: var(--portal-accent); }
  </style>
</head>
<body class="bg-light">
  <nav class="navbar navbar-dark navbar-portal mb-4">
    <div class="container">
      <a class="navbar-brand d-flex align-items-center" href="/dashboard">${logo}${escapeHtml(settings.tagline)}</a>
      <div class="d-flex align-items-center">${userNav}</div>
    </div>
  </nav>
  <main class="container">
    ${renderFlashes(ctx.flashes)}
    ${body}
  </main>
  <script src="https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/js/bootstrap.bundle.min.js"></script>
</body>
</html>`;
}
