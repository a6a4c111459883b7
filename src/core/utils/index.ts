export { abortable, anySignal, backoffDelay, type Deadline, deadline, sleep } from './timing.js';
