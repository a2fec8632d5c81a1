import { log } from "./log";
import type { Portal } from "./portal";

/**
 * Materializes every collection document with its defaults, then applies the
 * boot-time patches: ticket permissions on the privileged roles and the seed
 * department.
 */
export async function seed(portal: Portal) {
  const { collections } = portal;
  await Promise.all([
    collections.students.read(),
    collections.journals.read(),
    collections.assets.read(),
    collections.rules.read(),
    collections.announcements.read(),
    collections.calendar.read(),
    collections.siteSettings.read(),
    collections.users.read(),
    collections.tickets.read(),
  ]);

  const patched = await portal.roles.ensureTicketPermissions();
  if (patched > 0) {
    log(`Granted manage_tickets to ${patched} role(s)`, "seed");
  }

  if (await portal.departments.ensureSeeded()) {
    log("Created default department", "seed");
  }
}
