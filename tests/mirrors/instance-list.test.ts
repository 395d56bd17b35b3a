import { describe, it, expect, vi } from 'vitest';
import { parseInstanceList, refreshInstances } from '../../src/mirrors/instance-list';
import { EndpointPool } from '../../src/mirrors/endpoint-pool';
import { ManualClock } from '../helpers/manual-clock';

const INSTANCE_TABLE = `
| Instance | Country | Healthy | Online |
|---|---|---|---|
| [mirror-a.example](https://mirror-a.example/) | 🇩🇪 | :white_check_mark: | ✅ |
| [mirror-c.example](https://mirror-c.example) | 🇺🇸 | :white_check_mark: | ✅ |
| [mirror-d.example](https://mirror-d.example) | 🇫🇷 | :x: | ❌ |
| [mirror-c.example](https://mirror-c.example/) | 🇺🇸 | :white_check_mark: | ✅ |
`;

const createPool = () =>
  new EndpointPool(['https://mirror-a.example'], {
    failureThreshold: 5,
    baseDisableMs: 60_000,
    maxDisableMs: 3_600_000,
    clock: new ManualClock(),
  });

describe('parseInstanceList', () => {
  it('should return online instances once each', () => {
    expect(parseInstanceList(INSTANCE_TABLE)).toEqual(['https://mirror-a.example', 'https://mirror-c.example']);
  });
});

describe('refreshInstances', () => {
  it('should add instances the pool does not know yet', async () => {
    const pool = createPool();
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(INSTANCE_TABLE, { status: 200 }));

    const added = await refreshInstances(pool, { url: 'https://list.example/instances.md', timeoutMs: 1000, fetchImpl });

    expect(added).toBe(1);
    expect(pool.list().map(e => e.address)).toEqual(['https://mirror-a.example', 'https://mirror-c.example']);
  });

  it('should leave the pool untouched when the list is unavailable', async () => {
    const pool = createPool();
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('gone', { status: 404 }));

    expect(await refreshInstances(pool, { url: 'https://list.example/instances.md', timeoutMs: 1000, fetchImpl })).toBe(0);
    expect(pool.size).toBe(1);
  });
});
