import { z } from 'zod'
import { createTool, defineTool } from '@turnloop/core'

export const CalculatorInput = z.object({
    operation: z.enum(['add', 'subtract', 'multiply', 'divide']).describe('Arithmetic operation to perform'),
    x: z.number().describe('First operand'),
    y: z.number().describe('Second operand'),
})

export const calculatorDefinition = defineTool({
    name: 'calculator',
    description: 'Performs basic arithmetic operations on two numbers',
    input: CalculatorInput,
    execute({ operation, x, y }) {
        switch (operation) {
            case 'add':
                return x + y
            case 'subtract':
                return x - y
            case 'multiply':
                return x * y
            case 'divide':
                if (y === 0) throw new Error('Division by zero')
                return x / y
        }
    },
})

export function calculator() {
    return createTool(calculatorDefinition)
}
