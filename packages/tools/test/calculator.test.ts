import { describe, expect, it } from 'vitest'
import { calculator } from '../src'

describe('calculator', () => {
    const tool = calculator()

    it('should run each operation', async () => {
        expect((await tool.run({ operation: 'add', x: 2753, y: 2269 })).content).toBe('5022')
        expect((await tool.run({ operation: 'subtract', x: 10, y: 4 })).content).toBe('6')
        expect((await tool.run({ operation: 'multiply', x: 6, y: 7 })).content).toBe('42')
        expect((await tool.run({ operation: 'divide', x: 7, y: 2 })).content).toBe('3.5')
    })

    it('should report division by zero as an execution error', async () => {
        const result = await tool.run({ operation: 'divide', x: 1, y: 0 })
        expect(result).toMatchObject({ errorCode: 'execution_error', content: 'Tool execution error: Division by zero' })
    })

    it('should list the accepted operations', async () => {
        const result = await tool.run({ operation: 'power', x: 2, y: 3 })
        expect(result.errorCode).toBe('validation_error')
        expect(result.content).toBe(
            "Invalid arguments for tool 'calculator':\n" +
            "- Field 'operation': invalid value. Accepted values: 'add', 'subtract', 'multiply', 'divide'",
        )
    })

    it('should describe itself to the model', () => {
        expect(tool.schema.name).toBe('calculator')
        expect(tool.schema.parameters['required']).toEqual(['operation', 'x', 'y'])
    })
})
