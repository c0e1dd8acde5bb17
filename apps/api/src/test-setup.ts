import 'reflect-metadata';

import * as dotenv from 'dotenv';

import { join } from 'path';

// .env.example is the single source of configuration defaults
dotenv.config({ path: join(process.cwd(), '.env.example') });

process.env.NODE_ENV = 'test';
