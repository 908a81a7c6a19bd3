import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { CoreAPI, openCore } from '../core/api/CoreAPI';
import { Clock } from '../core/utils/Clock';
import { LookupCategory, LookupValue } from '../core/models/LookupValue';
import { Project } from '../core/models/Project';
import { TimeEntry } from '../core/models/TimeEntry';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

/**
 * Clock the tests move by hand
 */
export class FakeClock implements Clock {
    private current: number;

    constructor(start: Date | string) {
        this.current = new Date(start).getTime();
    }

    now(): Date {
        return new Date(this.current);
    }

    set(value: Date | string): void {
        this.current = new Date(value).getTime();
    }

    advance(ms: number): void {
        this.current += ms;
    }
}

/**
 * ISO timestamp of a local wall-clock time (month is 1-based)
 */
export function localTime(year: number, month: number, day: number, hour: number, minute: number = 0): string {
    return new Date(year, month - 1, day, hour, minute).toISOString();
}

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'timeledger-'));
}

export async function openTestCore(dataFolder: string, clock: Clock): Promise<CoreAPI> {
    return openCore({ dataFolder, clock, retryDelayMs: 0, logging: { silent: true } });
}

export interface TestContext {
    core: CoreAPI;
    clock: FakeClock;
    dataFolder: string;
    alice: LookupValue;
    bob: LookupValue;
    creation: LookupValue;
    review: LookupValue;
}

export async function requireLookup(core: CoreAPI, category: LookupCategory, name: string): Promise<LookupValue> {
    const value = await core.services.lookups.findByName(category, name);
    if (!value) {
        throw new Error(`missing ${category} value ${name}`);
    }
    return value;
}

/**
 * Fresh data folder with two employees and the default lookups
 */
export async function setupCore(start: string = localTime(2024, 3, 15, 9)): Promise<TestContext> {
    const dataFolder = await makeTempDir();
    const clock = new FakeClock(start);
    const core = await openTestCore(dataFolder, clock);

    const alice = await core.services.lookups.create('employees', { name: 'Alice Example', code: 'alice' });
    const bob = await core.services.lookups.create('employees', { name: 'Bob Example', code: 'bob' });
    const creation = await requireLookup(core, 'work_types', 'Creation');
    const review = await requireLookup(core, 'work_types', 'Review');

    return { core, clock, dataFolder, alice, bob, creation, review };
}

export async function teardown(context: { core: CoreAPI; dataFolder: string }): Promise<void> {
    await context.core.shutdown();
    await fs.remove(context.dataFolder);
}

export function makeProject(overrides: Partial<Project> = {}): Project {
    return {
        id: 'project-1',
        name: 'Safety Basics',
        code: 'SB-100',
        target_view_hours: 40,
        campus_id: null,
        offer_id: null,
        sub_offer_id: null,
        effort_type_id: null,
        status_id: null,
        team_assignments: {},
        tags: [],
        notes: '',
        archived: false,
        created_at: '2024-03-01T08:00:00.000Z',
        created_by: 'alice',
        updated_at: '2024-03-01T08:00:00.000Z',
        updated_by: 'alice',
        ...overrides,
    };
}

export function makeEntry(overrides: Partial<TimeEntry> = {}): TimeEntry {
    return {
        id: 'entry-1',
        project_id: 'project-1',
        user_id: 'user-1',
        work_type_id: 'work-1',
        start_time: '2024-03-15T09:00:00.000Z',
        end_time: '2024-03-15T10:30:00.000Z',
        notes: '',
        manual: false,
        created_at: '2024-03-15T10:30:00.000Z',
        updated_at: '2024-03-15T10:30:00.000Z',
        ...overrides,
    };
}
