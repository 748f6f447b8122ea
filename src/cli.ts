#!/usr/bin/env node
import dotenv from 'dotenv';
import { runApp } from './app.js';

dotenv.config();

process.exitCode = runApp(process.argv.slice(2), process.env);
