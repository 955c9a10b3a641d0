#!/usr/bin/env node
import { runMain } from 'citty'
import { searchCommandDef } from './commands'

runMain(searchCommandDef)
