import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'

/**
 * Outbound network is off for every test. Tests that need HTTP stub
 * globalThis.fetch themselves.
 */

const patched: Array<[object, string]> = [
  [http, 'request'],
  [http, 'get'],
  [https, 'request'],
  [https, 'get'],
  [net, 'connect'],
  [tls, 'connect'],
  [globalThis, 'fetch'],
]

const originals = patched.map(([target, key]): [object, string, unknown] => [
  target,
  key,
  Reflect.get(target, key),
])

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for harvester tests')
}

for (const [target, key] of patched) {
  Reflect.set(target, key, key === 'fetch' ? async () => blockedNetwork() : blockedNetwork)
}

process.on('exit', () => {
  for (const [target, key, original] of originals) {
    Reflect.set(target, key, original)
  }
})
