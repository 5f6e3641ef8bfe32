import { runDemo } from './demo';

runDemo(console.log);
