import { scoreConfidence } from '../../src/escalation/confidence-scorer';
import { EscalationPolicy } from '../../src/escalation/escalation-policy';
import { InMemoryEscalationSink, RedisEscalationSink } from '../../src/escalation/escalation-sink';
import { RecordingRedis, chunk } from '../helpers/fakes';

describe('scoreConfidence', () => {
  it('should rise with the top chunk score', () => {
    expect(scoreConfidence([chunk('a', 'A', 0.91), chunk('b', 'B', 0.4)], { degraded: false })).toBeCloseTo(0.928);
  });

  it('should use the empty floor without grounding', () => {
    expect(scoreConfidence([], { degraded: false })).toBe(0.1);
  });

  it('should halve confidence for a fallback answer', () => {
    expect(scoreConfidence([], { degraded: true })).toBe(0.05);
  });

  it('should stay within [0, 1] for out-of-range scores', () => {
    expect(scoreConfidence([chunk('a', 'A', 1.7)], { degraded: false })).toBe(1);
    expect(scoreConfidence([chunk('a', 'A', -3)], { degraded: false })).toBe(0.2);
  });
});

describe('EscalationPolicy', () => {
  const policy = new EscalationPolicy(0.4);
  const base = { confidence: 0.9, messageText: 'When are fees due?', pivotText: 'When are fees due?', generationDegraded: false };

  it('should not escalate a confident answer', () => {
    expect(policy.decide(base)).toEqual({ escalate: false, reason: null });
  });

  it('should escalate low confidence', () => {
    expect(policy.decide({ ...base, confidence: 0.1 })).toEqual({ escalate: true, reason: 'low_confidence' });
  });

  it('should not escalate at exactly the threshold', () => {
    expect(policy.decide({ ...base, confidence: 0.4 }).escalate).toBe(false);
  });

  it('should prefer generation failure over every other reason', () => {
    expect(
      policy.decide({ ...base, confidence: 0.05, messageText: 'talk to a human', generationDegraded: true }),
    ).toEqual({ escalate: true, reason: 'generation_failure' });
  });

  it('should detect explicit requests in English and Hindi', () => {
    expect(policy.decide({ ...base, messageText: 'Can I talk to a counsellor?' }).reason).toBe('explicit_request');
    expect(policy.decide({ ...base, messageText: 'mujhe insaan se baat karni hai' }).reason).toBe('explicit_request');
    expect(policy.decide({ ...base, messageText: 'मुझे किसी व्यक्ति से बात करनी है' }).reason).toBe('explicit_request');
  });

  it('should escalate a request verb followed by a person', () => {
    expect(policy.decide({ ...base, messageText: 'I need a real person please' }).reason).toBe('explicit_request');
    expect(policy.decide({ ...base, messageText: 'Can you connect me to a live agent?' }).reason).toBe('explicit_request');
  });

  it('should not escalate questions that only mention the word human', () => {
    expect(policy.decide({ ...base, messageText: 'Where is the Human Resources office?' })).toEqual({ escalate: false, reason: null });
    expect(policy.decide({ ...base, messageText: 'Is there a human rights club?' })).toEqual({ escalate: false, reason: null });
  });

  it('should check the pivot text too', () => {
    expect(
      policy.decide({ ...base, messageText: 'कृपया मदद करें', pivotText: 'I want to speak with a person' }).reason,
    ).toBe('explicit_request');
  });

  it('should use configured patterns instead of the defaults', () => {
    const custom = new EscalationPolicy(0.4, ['\\bwarden\\b']);
    expect(custom.decide({ ...base, messageText: 'Call the warden' }).reason).toBe('explicit_request');
    expect(custom.decide({ ...base, messageText: 'talk to a human' }).escalate).toBe(false);
  });
});

describe('InMemoryEscalationSink', () => {
  it('should store pending records with unique ids', async () => {
    const sink = new InMemoryEscalationSink();
    const first = await sink.create('s-1', 'low_confidence');
    const second = await sink.create('s-1', 'explicit_request', 'resolved');

    expect(first).toMatchObject({ sessionId: 's-1', reason: 'low_confidence', status: 'pending' });
    expect(second.status).toBe('resolved');
    expect(first.id).not.toBe(second.id);
    expect(sink.getAll()).toEqual([first, second]);
  });
});

describe('RedisEscalationSink', () => {
  it('should write the record and index it by status in one transaction', async () => {
    const redis = new RecordingRedis([[null, 'OK'], [null, 1]]);
    const record = await new RedisEscalationSink(redis, 'test:').create('s-1', 'low_confidence');

    expect(record).toMatchObject({ sessionId: 's-1', reason: 'low_confidence', status: 'pending' });
    expect(redis.transactions[0].commands).toEqual([
      ['set', `test:escalation:${record.id}`, JSON.stringify(record)],
      ['zadd', 'test:escalations:pending', record.createdAt, record.id],
    ]);
  });

  it('should reject when a queued command fails', async () => {
    const redis = new RecordingRedis([[null, 'OK'], [new Error('WRONGTYPE Operation against a key'), null]]);

    await expect(new RedisEscalationSink(redis, 'test:').create('s-1', 'explicit_request')).rejects.toThrow(
      'WRONGTYPE Operation against a key',
    );
  });

  it('should reject when the transaction is discarded', async () => {
    await expect(new RedisEscalationSink(new RecordingRedis(null), 'test:').create('s-1', 'low_confidence')).rejects.toThrow(
      'Escalation write for s-1 was discarded',
    );
  });
});
