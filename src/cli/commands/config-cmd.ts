import type { ResolvedConfig } from '../../config/schema.js'
import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

function isConfigKey(config: ResolvedConfig, key: string): key is keyof ResolvedConfig {
    return Object.prototype.hasOwnProperty.call(config, key)
}

export async function configCommand(container: Container, key?: string): Promise<void> {
    if (!key) {
        console.log(JSON.stringify(container.config, null, 2))
        return
    }

    if (isConfigKey(container.config, key)) {
        console.log(`${key}: ${JSON.stringify(container.config[key])}`)
    } else {
        console.log(colors.warn(`Config key '${key}' not found`))
    }
}
