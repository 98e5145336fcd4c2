export type RequestLike = {
  headers?: Record<string, string | string[] | undefined>;
};

export function getHeader(req: RequestLike, name: string): string {
  const value = req.headers?.[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value[0] ?? '';
  return '';
}
