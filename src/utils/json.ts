export const json = {
   stringify: (content: unknown): string =>
      typeof content === 'string' ? content : JSON.stringify(content),
}
