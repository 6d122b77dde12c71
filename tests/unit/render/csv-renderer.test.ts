import { describe, it, expect } from 'vitest'
import { CsvRenderer } from '../../../src/render/csv-renderer.js'
import { stats } from '../../helpers.js'

describe('CsvRenderer', () => {
  const renderer = new CsvRenderer()

  it('empty statistics → header, total row and one row per level', () => {
    expect(renderer.render(stats())).toBe(
      [
        'type,name,count',
        'total,all,0',
        'level,INFO,0',
        'level,WARNING,0',
        'level,ERROR,0',
        'level,DEBUG,0',
        '',
      ].join('\n'),
    )
  })

  it('appends one row per top error in rank order, quoting commas and quotes', () => {
    const output = renderer.render(
      stats({
        total: 3,
        countsByLevel: { INFO: 0, WARNING: 0, ERROR: 3, DEBUG: 0 },
        topErrors: [
          { message: 'disk full, sda1', count: 2 },
          { message: 'said "no"', count: 1 },
        ],
      }),
    )

    expect(output.split('\n').slice(6)).toEqual([
      'error,"disk full, sda1",2',
      'error,"said ""no""",1',
      '',
    ])
  })

  it('quotes a message containing a line feed, keeping every record intact', () => {
    const output = renderer.render(stats({ topErrors: [{ message: 'a\nb', count: 1 }] }))
    expect(output.endsWith('level,DEBUG,0\nerror,"a\nb",1\n')).toBe(true)
    // 7 records plus one embedded LF inside the quoted field
    expect(output.split('\n')).toHaveLength(9)
  })

  it('quotes a message containing a carriage return', () => {
    const output = renderer.render(stats({ topErrors: [{ message: 'a\rb', count: 1 }] }))
    expect(output.endsWith('error,"a\rb",1\n')).toBe(true)
  })

  it('leaves plain messages unquoted', () => {
    const output = renderer.render(stats({ topErrors: [{ message: 'timeout', count: 4 }] }))
    expect(output.endsWith('level,DEBUG,0\nerror,timeout,4\n')).toBe(true)
  })
})
