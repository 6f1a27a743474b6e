import path from 'path';
import { TemplateService, processScenes, toEmbedUrl, REQUIRED_PLACEHOLDERS } from '../services/templateService';

const fixture = (name: string) => path.resolve(__dirname, 'fixtures', name);

describe('templateService.processScenes', () => {
  it('pads short lists with "1"', () => {
    expect(processScenes('1,2')).toEqual(['1', '2', '1', '1']);
  });

  it('truncates long lists to four entries', () => {
    expect(processScenes('1,2,3,4,5')).toEqual(['1', '2', '3', '4']);
  });

  it('trims whitespace around entries', () => {
    expect(processScenes(' 7 , 8,9 ,10')).toEqual(['7', '8', '9', '10']);
  });
});

describe('templateService.toEmbedUrl', () => {
  it('converts short links and drops the query string', () => {
    expect(toEmbedUrl('https://youtu.be/abc123?t=5')).toBe('https://www.youtube.com/embed/abc123');
  });

  it('converts watch links and drops extra parameters', () => {
    expect(toEmbedUrl('https://youtube.com/watch?v=xyz&list=z')).toBe('https://www.youtube.com/embed/xyz');
  });

  it('leaves embed links unchanged', () => {
    expect(toEmbedUrl('https://www.youtube.com/embed/xyz')).toBe('https://www.youtube.com/embed/xyz');
  });

  it('passes unrecognised links through', () => {
    expect(toEmbedUrl('https://www.youtube.com/shorts/q1')).toBe('https://www.youtube.com/shorts/q1');
  });

  it('falls back to the default video for an empty link', () => {
    expect(toEmbedUrl('')).toBe('https://www.youtube.com/embed/dQw4w9WgXcQ');
  });
});

describe('TemplateService.render', () => {
  const service = new TemplateService(fixture('template.html'));
  const fields = {
    title: 'Heat',
    poster: 'HeatPoster',
    rating: '9.1',
    review: 'A great heist film.',
    scenes: '3,5',
    youtube: 'https://youtu.be/abc123?t=5',
    source_data: '2025/08/heat95',
  };

  it('replaces every placeholder occurrence', () => {
    const html = service.render(fields);
    const lines = html.split('\n');

    expect(lines[0]).toBe('<img src="/posters/HeatPoster.jpg" alt="HeatPoster">');
    expect(lines[1]).toBe('<span class="rating">9.1</span>');
    expect(lines[2]).toBe('<p>A great heist film.</p>');
    expect(lines[3]).toBe(
      '<img src="/2025/08/heat95/3.jpg"><img src="/2025/08/heat95/5.jpg"><img src="/2025/08/heat95/1.jpg"><img src="/2025/08/heat95/1.jpg">',
    );
    expect(lines[4]).toBe('<iframe src="https://www.youtube.com/embed/abc123"></iframe>');
    REQUIRED_PLACEHOLDERS.forEach((token) => expect(html).not.toContain(token));
  });

  it('is idempotent for identical field maps', () => {
    expect(service.render(fields)).toBe(service.render({ ...fields }));
  });

  it('uses defaults for missing fields', () => {
    const lines = service.render({}).split('\n');

    expect(lines[0]).toBe('<img src="/posters/DefaultPoster.jpg" alt="DefaultPoster">');
    expect(lines[1]).toBe('<span class="rating">0.0</span>');
    expect(lines[2]).toBe('<p>No review available</p>');
    expect(lines[3]).toBe(
      '<img src="/2025/01/default/1.jpg"><img src="/2025/01/default/2.jpg"><img src="/2025/01/default/3.jpg"><img src="/2025/01/default/4.jpg">',
    );
    expect(lines[4]).toBe('<iframe src="https://www.youtube.com/embed/dQw4w9WgXcQ"></iframe>');
  });

  it('renders an inline error when the template cannot be read', () => {
    const missing = new TemplateService(fixture('does-not-exist.html'));
    const html = missing.render(fields);

    expect(html.startsWith('<p>Error processing template: Cannot read template ')).toBe(true);
    expect(html.endsWith('</p>')).toBe(true);
  });
});

describe('TemplateService.validateTemplate', () => {
  it('accepts a template with all nine placeholders', () => {
    expect(new TemplateService(fixture('template.html')).validateTemplate()).toEqual({ valid: true, missing: [] });
  });

  it('reports the missing rating placeholder', () => {
    expect(new TemplateService(fixture('template_missing_rating.html')).validateTemplate()).toEqual({
      valid: false,
      missing: ['(2#Rating)'],
    });
  });

  it('reports a missing file without throwing', () => {
    expect(new TemplateService(fixture('does-not-exist.html')).validateTemplate()).toEqual({
      valid: false,
      missing: ['Template file not found'],
    });
  });

  it('validates the bundled post template', () => {
    const bundled = path.resolve(__dirname, '..', 'templates', 'post_template.html');
    expect(new TemplateService(bundled).validateTemplate()).toEqual({ valid: true, missing: [] });
  });
});
