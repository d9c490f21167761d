// @vitest-environment jsdom
import { describe, expect, it } from 'vitest'
import {
  LOGIN_MARKER,
  MALFORMED_RESPONSE_MESSAGE,
  NETWORK_ERROR_MESSAGE,
  buildLoginUrl,
  extractErrorFragment,
  getFailurePresentation,
} from './failureMessage'

describe('extractErrorFragment', () => {
  it('returns the inner HTML of the first container', () => {
    const page = '<html><body><nav class="container">Menu</nav><div class="container">second</div></body></html>'
    expect(extractErrorFragment(page)).toBe('Menu')
  })

  it('returns null for pages without a container', () => {
    expect(extractErrorFragment('<h1>Bad gateway</h1>')).toBeNull()
    expect(extractErrorFragment('   ')).toBeNull()
  })

  it('takes a custom selector', () => {
    expect(extractErrorFragment('<main><p id="err">Nope</p></main>', '#err')).toBe('Nope')
  })
})

describe('getFailurePresentation', () => {
  it('sends login walls to the login page before looking for a fragment', () => {
    const body = `<div class="container">Log in</div>${LOGIN_MARKER}`
    expect(getFailurePresentation({ kind: 'http', status: 403, body })).toEqual({ kind: 'login' })
  })

  it('shows the error fragment of a server-rendered page', () => {
    const body = '<div class="container"><h1>Please check your input</h1></div>'
    expect(getFailurePresentation({ kind: 'http', status: 400, body })).toEqual({
      kind: 'fragment',
      html: '<h1>Please check your input</h1>',
    })
  })

  it('falls back to the status code', () => {
    expect(getFailurePresentation({ kind: 'http', status: 502, body: 'Bad gateway' })).toEqual({
      kind: 'alert',
      message: 'An error of type 502 occurred.',
    })
  })

  it('uses fixed messages for network and malformed failures', () => {
    expect(getFailurePresentation({ kind: 'network', message: 'offline' })).toEqual({ kind: 'alert', message: NETWORK_ERROR_MESSAGE })
    expect(getFailurePresentation({ kind: 'malformed', message: 'x', body: '<html></html>' })).toEqual({
      kind: 'alert',
      message: MALFORMED_RESPONSE_MESSAGE,
    })
  })

  it('sends a login page served with 200 to the login page', () => {
    const body = `<html>${LOGIN_MARKER}<form></form></html>`
    expect(getFailurePresentation({ kind: 'malformed', message: 'Unexpected token <', body })).toEqual({ kind: 'login' })
  })
})

describe('buildLoginUrl', () => {
  it('points next at the current page', () => {
    expect(buildLoginUrl('/login', { pathname: '/orders/', search: '?page=2', hash: '#top' })).toBe('/login?next=%2Forders%2F%3Fpage%3D2%23top')
  })

  it('extends a login URL that already has a query', () => {
    expect(buildLoginUrl('/login?org=demo', { pathname: '/', search: '', hash: '' })).toBe('/login?org=demo&next=%2F')
  })
})
