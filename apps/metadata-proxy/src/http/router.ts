export type RouteKind = 'metrics' | 'ping' | 'health' | 'roleName' | 'credentials' | 'passthrough'

export type RouteResolution =
  | {kind: 'route'; route: RouteKind; pathname: string; params: Record<string, string>}
  | {kind: 'redirect'; location: string}
  | {kind: 'invalid'; reason: 'path_encoding_invalid' | 'path_not_canonical'}
  | {kind: 'not_found'}

type RouteDefinition = {
  route: RouteKind
  pattern: RegExp
  paramNames: readonly string[]
}

// Priority order; the first match wins and passthrough catches everything else.
const ROUTE_TABLE: readonly RouteDefinition[] = [
  {route: 'metrics', pattern: /^\/metrics$/u, paramNames: []},
  {route: 'ping', pattern: /^\/ping$/u, paramNames: []},
  {route: 'health', pattern: /^\/health$/u, paramNames: []},
  {
    route: 'roleName',
    pattern: /^\/([^/]+)\/meta-data\/iam\/security-credentials\/$/u,
    paramNames: ['version']
  },
  {
    route: 'credentials',
    pattern: /^\/([^/]+)\/meta-data\/iam\/security-credentials\/(.+)$/u,
    paramNames: ['version', 'role']
  },
  {route: 'passthrough', pattern: /^\//u, paramNames: []}
]

/**
 * Lexically normalizes a path: collapses repeated slashes and resolves `.` and `..`
 * segments without climbing above the root. A trailing slash is kept.
 */
export const cleanPath = (path: string) => {
  if (path.length === 0) {
    return '/'
  }

  const segments: string[] = []
  for (const segment of path.split('/')) {
    if (segment.length === 0 || segment === '.') {
      continue
    }
    if (segment === '..') {
      segments.pop()
      continue
    }
    segments.push(segment)
  }

  const cleaned = `/${segments.join('/')}`
  return path.endsWith('/') && cleaned !== '/' ? `${cleaned}/` : cleaned
}

const matchRoute = (pathname: string): RouteResolution => {
  for (const definition of ROUTE_TABLE) {
    const match = definition.pattern.exec(pathname)
    if (!match) {
      continue
    }

    const params: Record<string, string> = {}
    definition.paramNames.forEach((name, index) => {
      const value = match[index + 1]
      if (value !== undefined) {
        params[name] = value
      }
    })

    return {kind: 'route', route: definition.route, pathname, params}
  }

  return {kind: 'not_found'}
}

/**
 * Maps a raw request target to exactly one route. Matching happens on the decoded
 * path, so an encoded spelling of an intercepted path is still intercepted. A target
 * that only reaches an intercepted path once decoded segments are resolved is refused.
 */
export const resolveRoute = (rawTarget: string | undefined): RouteResolution => {
  if (!rawTarget || !rawTarget.startsWith('/')) {
    return {kind: 'not_found'}
  }

  const queryIndex = rawTarget.indexOf('?')
  const rawPath = queryIndex === -1 ? rawTarget : rawTarget.slice(0, queryIndex)
  const rawQuery = queryIndex === -1 ? '' : rawTarget.slice(queryIndex)

  const cleaned = cleanPath(rawPath)
  if (cleaned !== rawPath) {
    return {kind: 'redirect', location: `${cleaned}${rawQuery}`}
  }

  let decoded: string
  try {
    decoded = decodeURIComponent(rawPath)
  } catch {
    return {kind: 'invalid', reason: 'path_encoding_invalid'}
  }

  if (cleanPath(decoded) !== decoded) {
    return {kind: 'invalid', reason: 'path_not_canonical'}
  }

  return matchRoute(decoded)
}
