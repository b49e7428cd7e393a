// Test setup file
import nock from 'nock';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';

// Only the in-process supertest server may be reached
nock.disableNetConnect();
nock.enableNetConnect(/(127\.0\.0\.1|localhost)/);
