import { Orchestrator } from '../../src/runtime/orchestrator';
import { MemoryAuditSink } from '../../src/audit/sinks';
import { NotFoundError } from '../../src/domain/errors';
import { captureLogs } from '../helpers/fakes';

describe('Orchestrator', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  test('registerData stores the value and audits the registration', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });

    const uid = orchestrator.registerData('x', { a: 1 }, { description: 'test data', tags: ['t'], source: 'unit' });

    expect(orchestrator.store.get(uid).value).toEqual({ a: 1 });
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0].event).toBe('register_data');
    expect(sink.records[0].uid).toBe(uid);
    expect(sink.records[0].payload).toEqual({ name: 'x', description: 'test data', source: 'unit', tags: ['t'] });
  });

  test('registration without a sink is silent', () => {
    const orchestrator = new Orchestrator();
    const uid = orchestrator.registerData('x', 1);
    expect(orchestrator.audit.enabled).toBe(false);
    expect(orchestrator.store.get(uid).metadata.kind).toBe('data');
  });

  test('registerTool and registerAgent use their kinds', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    const tool = orchestrator.registerTool('double', (n: number) => n * 2, 'Doubles');
    const agent = orchestrator.registerAgent('writer', { role: 'report' }, 'Writes');

    expect(orchestrator.store.get(tool).metadata.kind).toBe('tool');
    expect(orchestrator.store.get(agent).metadata.kind).toBe('agent');
    expect(sink.records.map((r) => r.event)).toEqual(['register_tool', 'register_agent']);
    expect(sink.records[0].payload).toEqual({ name: 'double', kind: 'tool', description: 'Doubles', tags: [] });
    expect(Object.keys(orchestrator.toolTable())).toEqual(['double']);
  });

  test('updateData keeps the uid and audits the update', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    const uid = orchestrator.registerData('x', 1);

    const updated = orchestrator.updateData(uid, 2, 'refresher');
    expect(updated.uid).toBe(uid);
    expect(orchestrator.store.get(uid).value).toBe(2);
    expect(sink.byEvent('update_data')[0].payload).toMatchObject({ name: 'x', source: 'refresher' });
    expect(() => orchestrator.updateData('art_missing', 1)).toThrow(NotFoundError);
  });

  test('executeAgentCode binds the store and tools', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    orchestrator.registerData('prices', [1, 2, 3]);
    orchestrator.registerTool('sum', (values: number[]) => values.reduce((a, b) => a + b, 0));

    const result = orchestrator.executeAgentCode(
      'const prices = store.findByName("prices")[0].value; console.log(tools.sum(prices) * factor);',
      { factor: 10 },
    );

    expect(result.success).toBe(true);
    expect(result.stdout).toBe('60\n');
    const execution = sink.byEvent('execute_agent_code')[0];
    expect(execution.uid).toBeNull();
    expect(execution.payload).toMatchObject({ stdout: '60\n', stderr: '', success: true, fault: null });
  });

  test('scripts may register artifacts through the bound store', () => {
    const orchestrator = new Orchestrator();
    const result = orchestrator.executeAgentCode('store.create({ name: "derived", kind: "data", value: 42 });');
    expect(result.success).toBe(true);
    expect(orchestrator.store.findByName('derived')[0].value).toBe(42);
  });

  test('a faulting script is reported and audited, not thrown', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    const result = orchestrator.executeAgentCode('store.get("art_missing")');

    expect(result.success).toBe(false);
    expect(result.fault?.name).toBe('NotFoundError');
    expect(sink.byEvent('execute_agent_code')[0].payload).toMatchObject({
      success: false,
      fault: { name: 'NotFoundError', message: 'Artifact not found: art_missing' },
    });
  });

  test('recordEvent writes free-form events', () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    orchestrator.recordEvent('custom', 'art_1', { note: 'hi' });
    expect(sink.records[0]).toMatchObject({ event: 'custom', uid: 'art_1', payload: { note: 'hi' } });
  });

  test('each orchestrator owns its own store', () => {
    const a = new Orchestrator();
    const b = new Orchestrator();
    a.registerData('x', 1);
    expect(a.store.size).toBe(1);
    expect(b.store.size).toBe(0);
  });
});
