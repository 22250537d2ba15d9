export * from './playbook'
export * from './mindmap'
export * from './config'
