#!/usr/bin/env node
/**
 * opendata-mqa
 *
 * Command-line driver for metadata quality assessment of CKAN catalogs.
 */

import { Command } from 'commander'
import { VERSION } from '@opendata-mqa/core'
import { createAssessCommand, createRulesCommand } from './commands/index.js'

const program = new Command()

program
  .name('opendata-mqa')
  .description('Score open data catalog metadata against the FAIR+Context rule table')
  .version(VERSION)

program.addCommand(createAssessCommand())
program.addCommand(createRulesCommand())

await program.parseAsync()
