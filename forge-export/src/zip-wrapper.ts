/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import JSZip from 'jszip';

/**
 * zip container with synchronous access. entries are read up front;
 * text entries are decoded lazily and cached. generating the archive
 * is the only async step.
 */
export class ZipWrapper {

  protected records: Map<string, Uint8Array> = new Map();
  protected text: Map<string, string> = new Map();

  /** load an archive. throws whatever jszip throws on a bad archive */
  public static async Load(data: Uint8Array): Promise<ZipWrapper> {

    const zip = await JSZip.loadAsync(data);
    const wrapper = new ZipWrapper();

    for (const entry of Object.values(zip.files)) {
      if (!entry.dir) {
        wrapper.records.set(entry.name, await entry.async('uint8array'));
      }
    }

    return wrapper;

  }

  /**
   * check if entry exists
   */
  public Has(path: string): boolean {
    return this.text.has(path) || this.records.has(path);
  }

  /** every entry path, sorted */
  public Paths(): string[] {
    return Array.from(new Set([...this.records.keys(), ...this.text.keys()])).sort();
  }

  public Get(path: string): string {

    const text = this.text.get(path);
    if (text !== undefined) {
      return text;
    }

    const data = this.records.get(path);
    if (data) {
      const decoded = new TextDecoder().decode(data);
      this.text.set(path, decoded);
      this.records.delete(path);
      return decoded;
    }

    throw new Error('path not in zip file: ' + path);

  }

  public GetBinary(path: string): Uint8Array {
    const data = this.records.get(path);
    if (data) {
      return new Uint8Array(data);
    }
    const text = this.text.get(path);
    if (text !== undefined) {
      return new TextEncoder().encode(text);
    }
    throw new Error('path not in zip file: ' + path);
  }

  public Set(path: string, text: string): void {
    this.text.set(path, text);
    this.records.delete(path);
  }

  public SetBinary(path: string, data: Uint8Array): void {
    this.records.set(path, data);
    this.text.delete(path);
  }

  public Delete(path: string): void {
    this.records.delete(path);
    this.text.delete(path);
  }

  /**
   * nondestructive. [Content_Types].xml goes first, as office writes it.
   */
  public async Generate(): Promise<Buffer> {

    const zip = new JSZip();
    const paths = this.Paths().sort((a, b) => {
      if (a === '[Content_Types].xml') return -1;
      if (b === '[Content_Types].xml') return 1;
      return 0;
    });

    for (const path of paths) {
      const text = this.text.get(path);
      if (text !== undefined) {
        zip.file(path, text);
      }
      else {
        const data = this.records.get(path);
        if (data) {
          zip.file(path, data);
        }
      }
    }

    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 6 } });

  }

}
