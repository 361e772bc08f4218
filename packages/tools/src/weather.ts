import { z } from 'zod'
import { createTool, defineTool } from '@turnloop/core'

/** Temperatures in °C keyed by `Country/City`, e.g. `Romania/Bucharest`. */
export type WeatherTable = Readonly<Record<string, number>>

export interface WeatherDependencies {
    table: WeatherTable
}

export const WeatherInput = z.object({
    city: z.string().min(1).describe('City name, optionally prefixed with its country (Country/City)'),
})

function findEntry(table: WeatherTable, city: string): [string, number] | undefined {
    const wanted = city.trim().toLowerCase()
    return Object.entries(table).find(([key]) => {
        const name = key.split('/').pop() ?? key
        return key.toLowerCase() === wanted || name.toLowerCase() === wanted
    })
}

export const weatherDefinition = defineTool<typeof WeatherInput, WeatherDependencies>({
    name: 'weather',
    description: 'Looks up the current temperature for a city',
    input: WeatherInput,
    dependencies: ['table'],
    execute({ city }, { table }) {
        const entry = findEntry(table, city)
        if (!entry) throw new Error(`No weather data for '${city}'`)
        const [key, temperature] = entry
        return `The temperature in ${key} is ${temperature}°C`
    },
})

export function weather(table: WeatherTable) {
    return createTool(weatherDefinition, { table })
}
