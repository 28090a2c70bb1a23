import { Line, Resource, ResourceRef } from "../../types/menu.types";

export function toResourceRef(resource: Resource, contentType: string): ResourceRef {
  return {
    url: resource.url,
    contentType,
    ...(resource.hint !== undefined ? { hint: resource.hint } : {}),
    ...(resource.menuName !== undefined ? { menuName: resource.menuName } : {}),
    ...(resource.location !== undefined ? { location: resource.location } : {})
  };
}

/** Plain text split into lines; blank lines are kept since they end items. */
export function linesFromText(text: string, page?: number): Line[] {
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/\s+/g, " ").trim())
    .map(line => (page !== undefined ? { text: line, page } : { text: line }));
}
