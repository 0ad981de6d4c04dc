import { start } from './server';

void start();
