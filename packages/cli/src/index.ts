#!/usr/bin/env tsx

import { logger } from '@subreg/core'
import { config } from 'dotenv'
import { createProgram } from './program'

// Load environment variables
config()

// Initialize logger
logger.init()

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed:', error)
    process.exit(1)
  })
