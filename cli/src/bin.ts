#!/usr/bin/env node
import { runMain } from 'citty'
import { root } from './index.js'

// runMain prints a thrown error on stderr and exits 1.
void runMain(root)
