import * as clack from '@clack/prompts'
import type { TaskDetailRow } from '../core/types.js'
import { colors } from './ui.js'

const NEW_TASK = '__new_task__'

export async function askTask(rows: TaskDetailRow[], initialTask?: string): Promise<string | null> {
    const result = await clack.select({
        message: 'What were you working on?',
        initialValue: initialTask,
        options: [
            ...rows.map((row) => ({
                value: row.task,
                label: row.task,
                hint: row.isDefault ? 'default' : undefined,
            })),
            { value: NEW_TASK, label: colors.dim('New task...') },
        ],
    })

    if (clack.isCancel(result) || typeof result !== 'string') return null
    if (result !== NEW_TASK) return result

    const task = await clack.text({
        message: 'Task name',
        validate(value) {
            if (value.trim().length === 0) return 'Task name must not be empty'
        },
    })
    if (clack.isCancel(task)) return null
    return task.trim()
}

export async function askDetail(initialValue: string, recent: string[]): Promise<string | null> {
    const result = await clack.text({
        message: 'Detail',
        initialValue,
        placeholder: recent.length > 0 ? `e.g. ${recent.slice(0, 3).join(', ')}` : 'optional',
    })

    if (clack.isCancel(result)) return null
    return result ?? ''
}

export function showIntro(title: string): void {
    clack.intro(colors.brand(title))
}

export function showOutro(message: string): void {
    clack.outro(message)
}

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message })
    if (clack.isCancel(result)) return false
    return result
}
