#!/usr/bin/env node

import { config } from 'dotenv'
import { runCli } from '../src/cli/cli'
import { reportFailure } from '../src/cli/failure'

config()

runCli().catch(reportFailure)
