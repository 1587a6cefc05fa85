import { describe, test } from 'node:test'
import assert from 'node:assert/strict'
import {
  notices,
  INVALID_USERNAME,
  INVALID_DIRECT_FORMAT,
  NO_PENDING_OFFER,
  SENDFILE_USAGE,
  MAX_MESSAGE_BYTES,
  MESSAGE_TOO_LONG,
  FILENAME_TOO_LONG
} from '../src/protocol/messages.js'
import { Harness, pattern } from './helpers.js'

describe('Router authentication', () => {
  test('welcomes the first identity and announces later ones', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    await h.login('bob')

    assert.equal(await alice.expectText(), 'bob joined the chat!')
    assert.deepEqual(h.registry.listIdentities(), ['alice', 'bob'])
    assert.equal(h.registry.lookup('alice')?.state, 'Active')
  })

  test('trims the claimed identity', async () => {
    const h = new Harness()
    const carol = h.connect()
    await carol.say('  carol ')
    assert.equal(await carol.expectText(), notices.welcome('carol'))
    assert.deepEqual(h.registry.listIdentities(), ['carol'])
  })

  test('rejects an invalid identity and closes', async () => {
    const h = new Harness()
    const peer = h.connect()
    await peer.say('not valid!')

    assert.equal(await peer.expectText(), INVALID_USERNAME)
    assert.equal(await peer.expectClosed(), true)
    await h.settled()
    assert.equal(h.registry.size, 0)
  })

  test('rejects an identity that is already active', async () => {
    const h = new Harness()
    await h.login('alice')
    const impostor = h.connect()
    await impostor.say('alice')

    assert.equal(await impostor.expectText(), "ERROR: Username 'alice' is already taken")
    assert.equal(await impostor.expectClosed(), true)
    assert.equal(h.registry.size, 1)
    assert.equal(h.registry.lookup('alice')?.peerAddress, '127.0.0.1:40001')
  })

  test('closes silently when data arrives before an identity', async () => {
    const h = new Harness()
    const peer = h.connect()
    await peer.sendData(pattern(16))
    assert.equal(await peer.expectClosed(), true)
  })

  test('closes connections that never claim an identity', async () => {
    const h = new Harness({ authTimeoutMs: 50 })
    const peer = h.connect()
    assert.equal(await peer.expectClosed(), true)
    await h.settled()
    assert.ok(h.log.events.some(e => e.startsWith('Authentication from 127.0.0.1:40001 failed: Timed out after 50ms')))
  })

  test('an identity can be claimed again once its holder left', async () => {
    const h = new Harness()
    const first = await h.login('alice')
    await first.say('/quit')
    assert.equal(await first.expectText(), 'Goodbye alice!')
    assert.equal(await first.expectClosed(), true)
    await h.settled()

    await h.login('alice')
  })
})

describe('Router commands', () => {
  test('/list replies with the sorted identities', async () => {
    const h = new Harness()
    const carol = await h.login('carol')
    await h.login('alice')
    assert.equal(await carol.expectText(), 'alice joined the chat!')

    await carol.say('/list')
    assert.equal(await carol.expectText(), 'Active users: alice, carol')
  })

  test('broadcast reaches every other identity exactly once', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')
    const carol = await h.login('carol')
    assert.equal(await alice.expectText(), 'bob joined the chat!')
    assert.equal(await alice.expectText(), 'carol joined the chat!')
    assert.equal(await bob.expectText(), 'carol joined the chat!')

    await alice.say('  hello everyone  ')
    assert.equal(await bob.expectText(), 'alice: hello everyone')
    assert.equal(await carol.expectText(), 'alice: hello everyone')

    // No echo: the next thing alice sees is the reply to her next command.
    await alice.say('/list')
    assert.equal(await alice.expectText(), 'Active users: alice, bob, carol')
    await bob.say('/list')
    assert.equal(await bob.expectText(), 'Active users: alice, bob, carol')
  })

  test('direct message goes to the target and echoes to the sender', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')
    assert.equal(await alice.expectText(), 'bob joined the chat!')

    await alice.say('@bob are you there?')
    assert.equal(await bob.expectText(), '[PRIVATE] alice -> You: are you there?')
    assert.equal(await alice.expectText(), '[PRIVATE] You -> bob: are you there?')
  })

  test('direct message to an absent identity only answers the sender', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const carol = await h.login('carol')
    assert.equal(await alice.expectText(), 'carol joined the chat!')

    await alice.say('@bob hello')
    assert.equal(await alice.expectText(), "ERROR: User 'bob' not found or offline")

    await carol.say('/list')
    assert.equal(await carol.expectText(), 'Active users: alice, carol')
  })

  test('malformed commands are reported and the connection stays active', async () => {
    const h = new Harness()
    const alice = await h.login('alice')

    await alice.say('@bob')
    assert.equal(await alice.expectText(), INVALID_DIRECT_FORMAT)
    await alice.say('/sendfile bob')
    assert.equal(await alice.expectText(), SENDFILE_USAGE)
    await alice.say('/accept_file')
    assert.equal(await alice.expectText(), NO_PENDING_OFFER)

    await alice.say('/list')
    assert.equal(await alice.expectText(), 'Active users: alice')
  })

  test('the longest allowed message is relayed with its prefix', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')
    assert.equal(await alice.expectText(), 'bob joined the chat!')
    const text = 'x'.repeat(MAX_MESSAGE_BYTES)

    await alice.say(text)
    assert.equal(await bob.expectText(), `alice: ${text}`)

    await alice.say(`@bob ${text}`)
    assert.equal(await bob.expectText(), `[PRIVATE] alice -> You: ${text}`)
    assert.equal(await alice.expectText(), `[PRIVATE] You -> bob: ${text}`)
  })

  test('text that would not fit a frame once prefixed is refused and the sender stays', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')
    assert.equal(await alice.expectText(), 'bob joined the chat!')

    await alice.say('x'.repeat(4090))
    assert.equal(await alice.expectText(), MESSAGE_TOO_LONG)
    await alice.say(`@bob ${'y'.repeat(4090)}`)
    assert.equal(await alice.expectText(), MESSAGE_TOO_LONG)
    await alice.say(`/sendfile bob ${'f'.repeat(300)}.txt 10`)
    assert.equal(await alice.expectText(), FILENAME_TOO_LONG)

    await bob.say('/list')
    assert.equal(await bob.expectText(), 'Active users: alice, bob')
    assert.equal(h.registry.lookup('alice')?.state, 'Active')
  })

  test('blank text and stray data frames are ignored', async () => {
    const h = new Harness()
    const alice = await h.login('alice')

    await alice.say('   ')
    await alice.sendData(pattern(32))
    await alice.say('/list')
    assert.equal(await alice.expectText(), 'Active users: alice')
  })

  test('commands are logged with the sender identity', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    await alice.say('/list')
    await alice.expectText()

    assert.ok(h.log.events.includes('alice connected from 127.0.0.1:40001'))
    assert.ok(h.log.events.includes('[alice] /list'))
  })
})

describe('Router teardown', () => {
  test('/quit says goodbye, announces the departure and deregisters', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')

    await alice.say('/quit')
    assert.equal(await alice.expectText(), notices.goodbye('alice'))
    assert.equal(await alice.expectClosed(), true)
    assert.equal(await bob.expectText(), 'alice left the chat')
    assert.deepEqual(h.registry.listIdentities(), ['bob'])
  })

  test('a dropped connection is announced and deregistered', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    const bob = await h.login('bob')

    await alice.close()
    assert.equal(await bob.expectText(), 'alice left the chat')
    assert.deepEqual(h.registry.listIdentities(), ['bob'])
  })

  test('the last one out leaves an empty registry', async () => {
    const h = new Harness()
    const alice = await h.login('alice')
    await alice.close()
    await h.settled()
    assert.deepEqual(h.registry.listIdentities(), ['No users online'])
  })
})
