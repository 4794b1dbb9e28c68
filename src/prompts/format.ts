type PromptTemplateValues = Record<string, string>

const PLACEHOLDER_RE = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g

/** Replaces `{name}` placeholders; unknown names are left as written. */
export const renderPromptTemplate = (
  template: string,
  values: PromptTemplateValues,
): string =>
  template.replace(PLACEHOLDER_RE, (match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) return match
    return values[key] ?? match
  })

export const formatJsonBlock = (value: unknown): string =>
  ['```json', JSON.stringify(value, null, 2), '```'].join('\n')
