import type { Department, Journal } from "../../shared/schema";
import { escapeHtml, layout, type PageContext } from "./html";

export function renderLogin(ctx: PageContext): string {
  return layout(
    "Entrar",
    ctx,
    `<div class="row justify-content-center">
      <div class="col-md-5">
        <div class="card shadow-sm">
          <div class="card-body">
            <h1 class="h4 mb-3">Acesso ao painel</h1>
            <form method="post" action="/login">
              <div class="mb-3">
                <label class="form-label" for="username">Usuário</label>
                <input class="form-control" id="username" name="username" required autofocus>
              </div>
              <div class="mb-3">
                <label class="form-label" for="password">Senha</label>
                <input class="form-control" id="password" name="password" type="password" required>
              </div>
              <button class="btn btn-primary w-100" type="submit">Entrar</button>
            </form>
          </div>
        </div>
      </div>
    </div>`,
  );
}

export function renderApplyDepartment(ctx: PageContext, department: Department): string {
  const action = `/departments/apply/${encodeURIComponent(department.join_token)}`;
  return layout(
    `Inscrição · ${department.name}`,
    ctx,
    `<div class="row justify-content-center">
      <div class="col-md-7">
        <h1 class="h3">${escapeHtml(department.name)}</h1>
        <p class="text-muted">${escapeHtml(department.description)}</p>
        <p>Diretor: <strong>${escapeHtml(department.director)}</strong></p>
        <form method="post" action="${escapeHtml(action)}" class="card card-body">
          <div class="mb-2"><label class="form-label">Nome</label><input class="form-control" name="name" required></div>
          <div class="mb-2"><label class="form-label">Contato</label><input class="form-control" name="contact"></div>
          <div class="mb-2"><label class="form-label">Função desejada</label><input class="form-control" name="desired_role"></div>
          <div class="mb-3"><label class="form-label">Motivação</label><textarea class="form-control" name="motivation" rows="3"></textarea></div>
          <button class="btn btn-primary" type="submit">Enviar solicitação</button>
        </form>
      </div>
    </div>`,
  );
}

const JOURNAL_STATUS_LABELS: Record<Journal["status"], string> = {
  pendente: "Aguardando avaliação",
  aprovado: "Aprovado",
  rejeitado: "Rejeitado",
};

export function renderJournalApproval(ctx: PageContext, journal: Journal): string {
  const action = `/approve/${encodeURIComponent(journal.approval_token)}`;
  const reason = journal.approval_reason
    ? `<p class="text-danger">Motivo: ${escapeHtml(journal.approval_reason)}</p>`
    : "";
  return layout(
    `Aprovação · ${journal.title}`,
    ctx,
    `<div class="row justify-content-center">
      <div class="col-md-7">
        <h1 class="h3">${escapeHtml(journal.title)}</h1>
        <p class="text-muted">Edição ${escapeHtml(journal.edition)} · ${escapeHtml(journal.release_date)}</p>
        <p>${escapeHtml(journal.description)}</p>
        <p>Situação: <strong>${JOURNAL_STATUS_LABELS[journal.status]}</strong></p>
        ${reason}
        <form method="post" action="${escapeHtml(action)}" class="card card-body">
          <div class="mb-3"><label class="form-label">Justificativa (em caso de rejeição)</label>
            <textarea class="form-control" name="reason" rows="2"></textarea></div>
          <div class="d-flex gap-2">
            <button class="btn btn-success" name="action" value="approve" type="submit">Aprovar</button>
            <button class="btn btn-outline-danger" name="action" value="reject" type="submit">Rejeitar</button>
          </div>
        </form>
      </div>
    </div>`,
  );
}

export function renderError(ctx: PageContext, status: number, message: string): string {
  return layout(
    `Erro ${status}`,
    ctx,
    `<div class="text-center py-5">
      <h1 class="display-6">${status}</h1>
      <p class="lead">${escapeHtml(message)}</p>
      <a class="btn btn-primary" href="/">Voltar ao painel</a>
    </div>`,
  );
}
