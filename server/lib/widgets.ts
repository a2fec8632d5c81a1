import {
  DEFAULT_WIDGETS,
  type CalendarEvent,
  type StoredWidget,
  type Widget,
  type WidgetCard,
} from "../../shared/schema";

export interface DashboardStats {
  activeStudents: number;
  openTickets: number;
  pendingQueue: number;
  events: CalendarEvent[];
}

/**
 * Merges each stored widget over its default, drops entries without an id and
 * appends defaults that were never stored. Stored order wins.
 */
export function normalizeWidgets(stored: StoredWidget[] | undefined): Widget[] {
  const defaultMap = new Map(DEFAULT_WIDGETS.map((w) => [w.id, w]));
  const normalized: Widget[] = [];
  const seenIds = new Set<string>();

  for (const widget of stored ?? []) {
    if (!widget.id || seenIds.has(widget.id)) continue;
    const base = defaultMap.get(widget.id);
    const type = widget.type ?? base?.type;
    if (!type) continue;
    normalized.push({
      ...base,
      ...widget,
      id: widget.id,
      type,
      title: widget.title ?? base?.title ?? "",
      subtitle: widget.subtitle ?? base?.subtitle ?? "",
      enabled: widget.enabled ?? base?.enabled ?? true,
    });
    seenIds.add(widget.id);
  }

  for (const widget of DEFAULT_WIDGETS) {
    if (!seenIds.has(widget.id)) normalized.push({ ...widget });
  }
  return normalized;
}

export function nextEvent(events: CalendarEvent[]): CalendarEvent | undefined {
  return [...events].sort((a, b) => (a.date || "9999-12-31").localeCompare(b.date || "9999-12-31"))[0];
}

export function buildWidgetCards(widgets: Widget[], stats: DashboardStats): WidgetCard[] {
  const upcoming = nextEvent(stats.events);

  return widgets
    .filter((widget) => widget.enabled)
    .map((widget): WidgetCard => {
      if (widget.type === "metric" && widget.id === "students") {
        return { ...widget, value: stats.activeStudents, helper: "Acesso ao portal em dia" };
      }
      if (widget.type === "metric" && widget.id === "tickets") {
        return { ...widget, value: stats.openTickets, helper: "Inclui chamados com status aberto" };
      }
      if (widget.type === "metric" && widget.id === "departments") {
        return { ...widget, value: stats.pendingQueue, helper: "Solicitações aguardando decisão" };
      }
      if (widget.type === "event") {
        return upcoming
          ? {
              ...widget,
              value: upcoming.title,
              helper: `${upcoming.date} · ${upcoming.description}`.trim(),
            }
          : { ...widget, value: "Sem eventos", helper: "Adicione um evento no calendário" };
      }
      return { ...widget };
    });
}

/**
 * Applies the settings form: `enabled_<id>` is a checkbox, empty
 * `title_<id>`/`subtitle_<id>` keep the current text.
 */
export function applyWidgetForm(widgets: Widget[], form: Record<string, string | undefined>): Widget[] {
  return widgets.map((widget) => ({
    ...widget,
    enabled: form[`enabled_${widget.id}`] === "on",
    title: form[`title_${widget.id}`] || widget.title,
    subtitle: form[`subtitle_${widget.id}`] || widget.subtitle,
  }));
}
