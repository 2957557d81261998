import { describe, it, expect } from 'vitest'
import { fixedClock } from '../../../src/core/clock.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { NotFoundError } from '../../../src/core/errors.js'
import { Ledger } from '../../../src/ledger/ledger.js'
import { LedgerStore } from '../../../src/ledger/store.js'
import { TrackerService } from '../../../src/tracker/tracker-service.js'
import { silentLogger } from '../../helpers/fixtures.js'

const LEDGER_FILE = '/data/ledger.json'

class FlakyFileSystem extends MockFileSystem {
    failures = 0

    override async writeText(path: string, content: string): Promise<void> {
        if (this.failures > 0) {
            this.failures--
            throw Object.assign(new Error('EIO: write failed'), { code: 'EIO' })
        }
        await super.writeText(path, content)
    }
}

function savedTasks(fs: MockFileSystem): string[] {
    const saved: { entries: Array<{ task: string }> } = JSON.parse(fs.getFiles().get(LEDGER_FILE) ?? '{"entries":[]}')
    return saved.entries.map((row) => row.task)
}

function setup(saveCsvCopy = false, fs = new MockFileSystem()) {
    const ledger = new Ledger({ logger: silentLogger })
    const store = new LedgerStore(LEDGER_FILE, fs, silentLogger)
    const tracker = new TrackerService({
        ledger,
        store,
        fs,
        clock: fixedClock('2026-10-19 09:05:00'),
        settings: { csvDir: '/exports', saveCsvCopy },
        logger: silentLogger,
    })
    return { fs, ledger, tracker }
}

describe('TrackerService', () => {
    it('saves the ledger after every append', async () => {
        const { fs, tracker } = setup()
        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', detail: 'api', durationMinutes: 15 })

        const saved = JSON.parse(fs.getFiles().get(LEDGER_FILE) ?? '{}')
        expect(saved.entries).toEqual([
            { timestamp: '2026-10-19 09:00:00', task: 'Dev', detail: 'api', durationMinutes: 15 },
        ])
        expect(saved.latestDetails).toEqual([{ task: 'Dev', detail: 'api', lastTimestamp: '2026-10-19 09:00:00' }])
    })

    it('loads existing entries before the first write', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            LEDGER_FILE,
            JSON.stringify({
                version: 1,
                entries: [{ timestamp: '2026-10-16 17:00:00', task: 'Ops', detail: '', durationMinutes: 30 }],
            })
        )
        const { ledger, tracker } = setup(false, fs)

        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', durationMinutes: 15 })

        expect(ledger.size).toBe(2)
        expect((await tracker.open()).entries).toBe(1)
    })

    it('writes a CSV copy for entries on the hour when enabled', async () => {
        const { fs, tracker } = setup(true)
        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', detail: 'a, b', durationMinutes: 15 })

        expect(fs.getFiles().get('/exports/daily-tracker-2026-10-19.csv')).toBe(
            'date_time,task,detail,interval\r\n2026-10-19 09:00:00,Dev,"a, b",15\r\n'
        )
    })

    it('skips the CSV copy off the hour', async () => {
        const { fs, tracker } = setup(true)
        await tracker.appendEntry({ timestamp: '2026-10-19 09:15:00', task: 'Dev', durationMinutes: 15 })
        expect(fs.getFiles().has('/exports/daily-tracker-2026-10-19.csv')).toBe(false)
    })

    it('updates an entry and persists the change', async () => {
        const { fs, tracker } = setup()
        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', durationMinutes: 15 })

        const updated = await tracker.updateEntry('2026-10-19 09:00:00', { task: 'Ops', durationMinutes: 30 })

        expect(updated).toEqual({ timestamp: '2026-10-19 09:00:00', task: 'Ops', detail: '', durationMinutes: 30 })
        expect(JSON.parse(fs.getFiles().get(LEDGER_FILE) ?? '{}').entries[0].task).toBe('Ops')
        await expect(tracker.updateEntry('2026-10-19 10:00:00', { task: 'Ops', durationMinutes: 15 })).rejects.toBeInstanceOf(
            NotFoundError
        )
    })

    it('truncates the ledger on disk', async () => {
        const { fs, ledger, tracker } = setup()
        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', durationMinutes: 15 })

        await tracker.truncate()

        expect(ledger.size).toBe(0)
        expect(JSON.parse(fs.getFiles().get(LEDGER_FILE) ?? '{}')).toEqual({ version: 1, entries: [], latestDetails: [] })
    })

    it('exports only the requested number of previous days', async () => {
        const { fs, tracker } = setup()
        await tracker.appendEntry({ timestamp: '2026-10-10 09:00:00', task: 'Old', durationMinutes: 15 })
        await tracker.appendEntry({ timestamp: '2026-10-18 09:00:00', task: 'New', durationMinutes: 15 })

        const file = await tracker.exportCsv({ dir: '/tmp/out', previousDays: 7 })

        expect(file).toBe('/tmp/out/daily-tracker-2026-10-19.csv')
        expect(fs.getFiles().get(file)).toBe('date_time,task,detail,interval\r\n2026-10-18 09:00:00,New,,15\r\n')
    })

    it('keeps every write when a second one starts while the ledger is still loading', async () => {
        for (const ticks of [0, 1, 2, 3, 4, 5, 6]) {
            const fs = new MockFileSystem({
                [LEDGER_FILE]: JSON.stringify({
                    version: 1,
                    entries: [{ timestamp: '2026-10-19 08:00:00', task: 'Old', detail: '', durationMinutes: 15 }],
                }),
            })
            const { ledger, tracker } = setup(false, fs)

            const first = tracker.appendEntry({ timestamp: '2026-10-19 08:15:00', task: 'A', durationMinutes: 15 })
            for (let i = 0; i < ticks; i++) await Promise.resolve()
            const second = tracker.appendEntry({ timestamp: '2026-10-19 08:30:00', task: 'B', durationMinutes: 15 })
            await Promise.all([first, second])

            expect(ledger.allEntries().map((e) => e.task)).toEqual(['Old', 'A', 'B'])
            expect(savedTasks(fs)).toEqual(['Old', 'A', 'B'])
        }
    })

    it('undoes an append whose save fails so it can be retried', async () => {
        const fs = new FlakyFileSystem()
        fs.failures = 1
        const { ledger, tracker } = setup(false, fs)
        const input = { timestamp: '2026-10-19 09:00:00', task: 'Dev', durationMinutes: 15 }

        await expect(tracker.appendEntry(input)).rejects.toThrow('EIO: write failed')
        expect(ledger.size).toBe(0)

        await tracker.appendEntry(input)
        expect(ledger.size).toBe(1)
        expect(savedTasks(fs)).toEqual(['Dev'])
    })

    it('undoes an update whose save fails', async () => {
        const fs = new FlakyFileSystem()
        const { ledger, tracker } = setup(false, fs)
        await tracker.appendEntry({ timestamp: '2026-10-19 09:00:00', task: 'Dev', detail: 'api', durationMinutes: 15 })
        fs.failures = 1

        await expect(
            tracker.updateEntry('2026-10-19 09:00:00', { task: 'Ops', detail: 'deploy', durationMinutes: 30 })
        ).rejects.toThrow('EIO: write failed')

        expect(ledger.get('2026-10-19 09:00:00')).toEqual({
            timestamp: '2026-10-19 09:00:00',
            task: 'Dev',
            detail: 'api',
            durationMinutes: 15,
        })
        expect(ledger.latestDetail('Ops')).toBeUndefined()
        expect(ledger.latestDetail('Dev')?.detail).toBe('api')
        expect(savedTasks(fs)).toEqual(['Dev'])
    })

    it('loads again after a failed load', async () => {
        const fs = new MockFileSystem({ [LEDGER_FILE]: '{ not json' })
        const { tracker } = setup(false, fs)

        await expect(tracker.open()).rejects.toThrow('is not valid JSON')
        fs.setFile(LEDGER_FILE, JSON.stringify({ version: 1, entries: [] }))

        expect(await tracker.open()).toEqual({ entries: 0, corrupt: [] })
    })
})
