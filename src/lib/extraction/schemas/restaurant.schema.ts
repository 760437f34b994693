/**
 * Restaurant Schema
 * Default field set for restaurant websites
 */

import { PageType } from '../../crawling/crawling.types';
import { FieldSchema } from '../extraction.types';

export const RESTAURANT_SCHEMA: FieldSchema = {
  domain: 'restaurant',
  entityTypes: [
    'Restaurant',
    'FoodEstablishment',
    'LocalBusiness',
    'CafeOrCoffeeShop',
    'BarOrPub',
    'Bakery',
    'FastFoodRestaurant',
    'IceCreamShop',
    'Winery',
    'Brewery',
  ],
  fields: [
    {
      name: 'name',
      required: true,
      importanceWeight: 1.0,
      structuredDataKeys: ['name'],
      labels: ['restaurant name', 'name'],
      authoritativePageTypes: [PageType.HOME, PageType.ABOUT],
    },
    {
      name: 'address',
      required: true,
      importanceWeight: 0.9,
      format: 'address',
      structuredDataKeys: ['address'],
      labels: ['address', 'location', 'visit us', 'find us'],
      authoritativePageTypes: [PageType.HOME, PageType.CONTACT],
    },
    {
      name: 'phone',
      required: true,
      importanceWeight: 0.9,
      format: 'phone',
      structuredDataKeys: ['telephone'],
      labels: ['phone', 'tel', 'telephone', 'call'],
      authoritativePageTypes: [PageType.CONTACT],
    },
    {
      name: 'email',
      required: false,
      importanceWeight: 0.5,
      format: 'email',
      structuredDataKeys: ['email'],
      labels: ['email', 'e-mail'],
      authoritativePageTypes: [PageType.CONTACT],
    },
    {
      name: 'hours',
      required: false,
      importanceWeight: 0.7,
      format: 'hours',
      structuredDataKeys: ['openingHours', 'openingHoursSpecification'],
      labels: ['hours', 'opening hours', 'business hours'],
      authoritativePageTypes: [PageType.CONTACT, PageType.HOURS],
    },
    {
      name: 'price_range',
      required: false,
      importanceWeight: 0.4,
      format: 'price_range',
      structuredDataKeys: ['priceRange'],
      labels: ['price range', 'price'],
      authoritativePageTypes: [PageType.MENU],
    },
    {
      name: 'cuisine',
      required: false,
      importanceWeight: 0.6,
      structuredDataKeys: ['servesCuisine'],
      labels: ['cuisine', 'cuisines'],
      authoritativePageTypes: [PageType.ABOUT, PageType.HOME],
    },
    {
      name: 'menu',
      required: false,
      importanceWeight: 0.6,
      multiple: true,
      structuredDataKeys: ['hasMenu', 'hasMenuItem', 'menu'],
      authoritativePageTypes: [PageType.MENU],
    },
    {
      name: 'social_media',
      required: false,
      importanceWeight: 0.3,
      multiple: true,
      format: 'url',
      structuredDataKeys: ['sameAs'],
    },
  ],
};
