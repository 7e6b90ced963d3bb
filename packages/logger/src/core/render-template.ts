const PLACEHOLDER = /\{\{|\}\}|\{([A-Za-z_][\w.]*)\}/g

/**
 * Renders `{name}` placeholders from `properties`.
 *
 * - strings are inserted as-is, other values via JSON
 * - unknown names stay verbatim
 * - `{{` and `}}` produce literal braces
 *
 * @example
 * ```ts
 * renderTemplate("Order {orderId} shipped", { orderId: 42 }) // "Order 42 shipped"
 * ```
 */
export function renderTemplate(template: string, properties: Record<string, unknown>): string {
  if (!template.includes("{") && !template.includes("}")) return template

  return template.replace(PLACEHOLDER, (match: string, name: string | undefined) => {
    if (match === "{{") return "{"
    if (match === "}}") return "}"
    if (name === undefined || !Object.hasOwn(properties, name)) return match

    return formatValue(properties[name])
  })
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value
  if (value === undefined) return "undefined"
  if (value instanceof Error) return value.message

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
