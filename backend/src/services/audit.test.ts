import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { AuditLog, PinoAuditSink, type AuditInput } from './audit.js';
import { MemoryAuditSink } from '../testing/fixtures.js';

const event = (actor: string, action: string, result: AuditInput['result'] = 'success'): AuditInput => ({ actor, action, result });

describe('AuditLog', () => {
  it('writes to the sink before acknowledging', () => {
    const sink = new MemoryAuditSink();
    const log = new AuditLog(sink);
    const recorded = log.record({ ...event('alice', 'ssh.sign'), details: { role: 'developer' } });
    expect(sink.events).toEqual([recorded]);
    expect(recorded.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(recorded)).toBe(true);
    expect(Object.isFrozen(recorded.details)).toBe(true);
  });

  it('fails the record when the sink cannot write', () => {
    const sink = new MemoryAuditSink();
    sink.failing = true;
    const log = new AuditLog(sink);
    expect(() => log.record(event('alice', 'ssh.sign'))).toThrow('failed to record audit event');
    expect(log.query().items).toEqual([]);
    expect(log.stats().counters).toEqual({});
  });

  it('swallows sink failures only in tryRecord', () => {
    const sink = new MemoryAuditSink();
    sink.failing = true;
    expect(new AuditLog(sink).tryRecord(event('alice', 'ssh.sign', 'failure'))).toBeUndefined();
  });

  it('keeps a bounded window of recent events', () => {
    const log = new AuditLog(new MemoryAuditSink(), 3);
    for (let i = 0; i < 5; i++) log.record(event(`user${i}`, 'kubeconfig.generate'));
    expect(log.query({ dir: 'asc' }).items.map((e) => e.actor)).toEqual(['user2', 'user3', 'user4']);
    expect(log.stats()).toMatchObject({ buffered: 3, counters: { 'kubeconfig.generate:success': 5 } });
  });

  it('filters and sorts', () => {
    const log = new AuditLog(new MemoryAuditSink());
    log.record(event('carol', 'ssh.sign'));
    log.record(event('alice', 'ssh.sign', 'denied'));
    log.record(event('bob', 'user.create'));
    log.record(event('alice', 'ssh.sign'));
    expect(log.query({ actor: 'alice' }).items.map((e) => e.result)).toEqual(['success', 'denied']);
    expect(log.query({ action: 'ssh.sign', result: 'denied' }).items).toHaveLength(1);
    expect(log.query({ sort: 'actor', dir: 'asc' }).items.map((e) => e.actor)).toEqual(['alice', 'alice', 'bob', 'carol']);
    expect(log.query({ sort: 'nonsense', dir: 'asc' }).items.map((e) => e.actor)).toEqual(['carol', 'alice', 'bob', 'alice']);
  });

  it('pages with a cursor', () => {
    const log = new AuditLog(new MemoryAuditSink());
    for (let i = 0; i < 5; i++) log.record(event(`user${i}`, 'auth.login'));
    const first = log.query({ limit: 2 });
    expect(first.items.map((e) => e.actor)).toEqual(['user4', 'user3']);
    const second = log.query({ limit: 2, cursor: first.nextCursor });
    expect(second.items.map((e) => e.actor)).toEqual(['user2', 'user1']);
    const last = log.query({ limit: 2, cursor: second.nextCursor });
    expect(last.items.map((e) => e.actor)).toEqual(['user0']);
    expect(last.nextCursor).toBeUndefined();
  });

  it('clamps the page size', () => {
    const log = new AuditLog(new MemoryAuditSink());
    for (let i = 0; i < 3; i++) log.record(event('a', 'auth.login'));
    expect(log.query({ limit: 0 }).items).toHaveLength(1);
    expect(log.query({ limit: 10_000 }).items).toHaveLength(3);
  });

  it('counts by action and result in key order', () => {
    const log = new AuditLog(new MemoryAuditSink());
    log.record(event('a', 'ssh.sign', 'failure'));
    log.record(event('a', 'auth.login'));
    log.record(event('a', 'ssh.sign'));
    log.record(event('a', 'ssh.sign'));
    expect(Object.entries(log.stats().counters)).toEqual([
      ['auth.login:success', 1],
      ['ssh.sign:failure', 1],
      ['ssh.sign:success', 2],
    ]);
  });
});

describe('PinoAuditSink', () => {
  it('appends one JSON line per event', () => {
    const file = path.join(mkdtempSync(path.join(tmpdir(), 'audit-')), 'logs', 'audit.log');
    const log = new AuditLog(new PinoAuditSink(file));
    const recorded = log.record({ ...event('alice', 'ssh.sign'), targetId: '3e9' });
    const lines = readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    const line = JSON.parse(lines[0]);
    expect(line.msg).toBe('ssh.sign');
    expect(line.audit).toEqual({ id: recorded.id, ts: recorded.ts, actor: 'alice', action: 'ssh.sign', result: 'success', targetId: '3e9' });
  });
});
